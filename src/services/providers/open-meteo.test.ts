import { AxiosError, AxiosHeaders } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ProviderError } from '../../lib/errors';
import { getJson } from '../http';
import { OpenMeteoService } from './open-meteo';
import type { FetchContext, Segment } from '../../types';

vi.mock('../http', async importOriginal => {
    const actual = await importOriginal<typeof import('../http')>();
    return { ...actual, getJson: vi.fn() };
});

const getJsonMock = vi.mocked(getJson);

const segment: Segment = {
    index: 0,
    range: { start: '2024-01-01', end: '2024-01-03' },
    providerOrder: ['open-meteo']
};
const location = { latitude: 47.37, longitude: 8.54 };

describe('OpenMeteoService', () => {
    let service: OpenMeteoService;
    let context: FetchContext;
    let reportUsage: Mock<() => void>;

    beforeEach(() => {
        getJsonMock.mockReset();
        service = new OpenMeteoService();
        reportUsage = vi.fn<() => void>();
        context = { reportUsage };
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('requests the archive endpoint with the segment dates and daily variables', async () => {
        const controller = new AbortController();
        getJsonMock.mockResolvedValue({ daily: { time: [] } });

        await service.fetchSegment(segment, location, ['precipitation_sum', 'temperature_2m_max'], {
            reportUsage,
            signal: controller.signal
        });

        expect(getJsonMock).toHaveBeenCalledWith('https://archive-api.open-meteo.com/v1/archive', {
            params: {
                latitude: 47.37,
                longitude: 8.54,
                start_date: '2024-01-01',
                end_date: '2024-01-03',
                daily: 'precipitation_sum,temperature_2m_max',
                timezone: 'auto'
            },
            timeout: 60_000,
            signal: controller.signal
        });
        expect(reportUsage).toHaveBeenCalledTimes(1);
    });

    it('maps daily columns to records with explicit nulls', async () => {
        getJsonMock.mockResolvedValue({
            daily: {
                time: ['2024-01-01', '2024-01-02', '2024-01-03'],
                precipitation_sum: [1.2, null, null],
                temperature_2m_max: [5, 6, null]
            }
        });

        const records = await service.fetchSegment(segment, location, ['precipitation_sum', 'temperature_2m_max'], context);

        expect(records).toEqual([
            { date: '2024-01-01', values: { precipitation_sum: 1.2, temperature_2m_max: 5 }, source: 'open-meteo' },
            { date: '2024-01-02', values: { precipitation_sum: null, temperature_2m_max: 6 }, source: 'open-meteo' }
        ]);
    });

    it('fills a variable the archive left out with nulls', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        getJsonMock.mockResolvedValue({ daily: { time: ['2024-01-01'], precipitation_sum: [0] } });

        const records = await service.fetchSegment(segment, location, ['precipitation_sum', 'sunshine_duration'], context);

        expect(records).toEqual([
            { date: '2024-01-01', values: { precipitation_sum: 0, sunshine_duration: null }, source: 'open-meteo' }
        ]);
        expect(warn).toHaveBeenCalledWith('[WeatherArchive] Open-Meteo omitted sunshine_duration; filling with nulls');
    });

    it('rejects an undecodable body as an invalid request', async () => {
        getJsonMock.mockResolvedValue({ error: true, reason: 'nope' });

        await expect(service.fetchSegment(segment, location, ['precipitation_sum'], context)).rejects.toMatchObject({
            kind: 'invalid_request',
            providerId: 'open-meteo'
        });
        expect(reportUsage).toHaveBeenCalledTimes(1);
    });

    it('classifies HTTP failures and still reports the call', async () => {
        const config = { headers: new AxiosHeaders() };
        getJsonMock.mockRejectedValue(
            new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, undefined, {
                status: 503,
                statusText: 'Service Unavailable',
                headers: {},
                data: {},
                config
            })
        );

        const error = await service.fetchSegment(segment, location, ['precipitation_sum'], context).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({ kind: 'transient', status: 503 });
        expect(reportUsage).toHaveBeenCalledTimes(1);
    });

    it('honours a custom base URL and profile overrides', async () => {
        const custom = new OpenMeteoService({ baseUrl: 'http://localhost:8080/v1/', profile: { requestTimeoutMs: 5000 } });
        getJsonMock.mockResolvedValue({ daily: { time: [] } });

        await custom.fetchSegment(segment, location, ['precipitation_sum'], context);

        expect(getJsonMock.mock.calls[0][0]).toBe('http://localhost:8080/v1/archive');
        expect(getJsonMock.mock.calls[0][1]).toMatchObject({ timeout: 5000 });
        expect(custom.profile.maxSpanDays).toBe(365);
        expect(custom.isAvailable()).toBe(true);
    });
});
