import axios, { type AxiosError, type AxiosRequestConfig } from 'axios';
import { CancelledError, ProviderError } from '../lib/errors';
import { DEFAULT_USER_AGENT } from '../lib/config';
import type { ProviderErrorKind, ProviderId } from '../types';

const DEFAULT_TIMEOUT_MS = 30_000;

const http = axios.create({
    timeout: DEFAULT_TIMEOUT_MS,
    headers: {
        'User-Agent': DEFAULT_USER_AGENT,
        Accept: 'application/json'
    }
});

const TRANSIENT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE', 'ERR_NETWORK']);

export function setUserAgent(userAgent: string): void {
    http.defaults.headers.common['User-Agent'] = userAgent;
}

export const classifyStatus = (status?: number): ProviderErrorKind => {
    if (!status) return 'transient';
    if (status === 429) return 'rate_limited';
    if (status === 401 || status === 403) return 'auth';
    if (status === 408 || status >= 500) return 'transient';
    return 'invalid_request';
};

/** Retry-After as either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
    if (typeof value !== 'string' && typeof value !== 'number') return undefined;
    const seconds = Number(value);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const date = Date.parse(String(value));
    return Number.isFinite(date) ? Math.max(0, date - now) : undefined;
}

export const formatAxiosError = (error: unknown, context: string) => {
    if (!axios.isAxiosError(error)) {
        return `${context}: ${error instanceof Error ? error.message : 'Unexpected error.'}`;
    }
    const status = error.response?.status;
    const statusText = error.response?.statusText || 'Unknown error';
    return `${context}: ${status ? `${status} ${statusText}` : `Network/timeout error (${error.code ?? 'no code'})`}.`;
};

function classifyAxiosError(error: AxiosError): ProviderErrorKind {
    const status = error.response?.status;
    if (!status && error.code && TRANSIENT_CODES.has(error.code)) return 'transient';
    return classifyStatus(status);
}

/**
 * Maps anything thrown by a provider call onto the engine taxonomy. Aborts
 * become CancelledError so callers never mistake them for provider faults.
 */
export function toProviderError(providerId: ProviderId, error: unknown, signal?: AbortSignal): ProviderError | CancelledError {
    if (error instanceof ProviderError || error instanceof CancelledError) return error;
    if (axios.isCancel(error) || signal?.aborted) return new CancelledError();
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        return new ProviderError(providerId, classifyAxiosError(error), formatAxiosError(error, `${providerId} request failed`), {
            status,
            retryAfterMs: status === 429 ? parseRetryAfter(error.response?.headers?.['retry-after']) : undefined,
            cause: error
        });
    }
    return new ProviderError(providerId, 'transient', formatAxiosError(error, `${providerId} request failed`), { cause: error });
}

/** Single GET attempt. Retrying is the coordinator's job. */
export async function getJson<T>(url: string, config: AxiosRequestConfig = {}): Promise<T> {
    const response = await http.get<T>(url, config);
    return response.data;
}
