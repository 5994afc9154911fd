import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import { describe, expect, it } from 'vitest';
import { CancelledError, ProviderError } from '../lib/errors';
import { classifyStatus, formatAxiosError, parseRetryAfter, toProviderError } from './http';

function httpError(status: number, statusText: string, headers: Record<string, string> = {}) {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
        status,
        statusText,
        headers,
        data: {},
        config
    });
}

describe('classifyStatus', () => {
    it.each([
        [undefined, 'transient'],
        [408, 'transient'],
        [500, 'transient'],
        [503, 'transient'],
        [429, 'rate_limited'],
        [401, 'auth'],
        [403, 'auth'],
        [400, 'invalid_request'],
        [404, 'invalid_request']
    ])('maps %s to %s', (status, kind) => {
        expect(classifyStatus(status)).toBe(kind);
    });
});

describe('parseRetryAfter', () => {
    it('reads delta-seconds', () => {
        expect(parseRetryAfter('3')).toBe(3000);
        expect(parseRetryAfter(0)).toBe(0);
    });

    it('reads an HTTP date relative to now', () => {
        const now = Date.parse('Wed, 21 Oct 2015 07:27:50 GMT');

        expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', now)).toBe(10_000);
    });

    it('ignores anything else', () => {
        expect(parseRetryAfter('soon')).toBeUndefined();
        expect(parseRetryAfter(undefined)).toBeUndefined();
    });
});

describe('toProviderError', () => {
    it('classifies a 429 and keeps the Retry-After hint', () => {
        const error = toProviderError('meteostat', httpError(429, 'Too Many Requests', { 'retry-after': '2' }));

        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({
            providerId: 'meteostat',
            kind: 'rate_limited',
            status: 429,
            retryAfterMs: 2000,
            message: 'meteostat request failed: 429 Too Many Requests.'
        });
    });

    it('classifies server and client errors', () => {
        expect(toProviderError('open-meteo', httpError(502, 'Bad Gateway'))).toMatchObject({ kind: 'transient', status: 502 });
        expect(toProviderError('open-meteo', httpError(400, 'Bad Request'))).toMatchObject({ kind: 'invalid_request', status: 400 });
        expect(toProviderError('meteostat', httpError(403, 'Forbidden'))).toMatchObject({ kind: 'auth' });
    });

    it('treats timeouts and network failures as transient', () => {
        const error = toProviderError('open-meteo', new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED'));

        expect(error).toMatchObject({
            kind: 'transient',
            message: 'open-meteo request failed: Network/timeout error (ECONNABORTED).'
        });
    });

    it('turns cancellation into CancelledError', () => {
        expect(toProviderError('open-meteo', new CanceledError())).toBeInstanceOf(CancelledError);

        const controller = new AbortController();
        controller.abort();
        expect(toProviderError('open-meteo', new Error('aborted'), controller.signal)).toBeInstanceOf(CancelledError);
    });

    it('passes engine errors through untouched', () => {
        const original = new ProviderError('meteostat', 'invalid_request', 'bad body');

        expect(toProviderError('meteostat', original)).toBe(original);
    });

    it('falls back to transient for unknown errors', () => {
        expect(toProviderError('open-meteo', new Error('socket hang up'))).toMatchObject({
            kind: 'transient',
            message: 'open-meteo request failed: socket hang up'
        });
    });
});

describe('formatAxiosError', () => {
    it('describes a non-error value', () => {
        expect(formatAxiosError('nope', 'ctx')).toBe('ctx: Unexpected error.');
    });
});
