import { z } from 'zod';
import { DEFAULT_METEOSTAT_BASE_URL } from '../../lib/config';
import { toCalendarDate } from '../../lib/dateUtils';
import { ProviderError } from '../../lib/errors';
import { getProviderDefinition } from '../../lib/providers';
import { getJson, toProviderError } from '../http';
import { numberOrNull, toDailyRecord } from './records';
import type {
    Coordinates,
    DailyRecord,
    DataSourceCapabilities,
    DataSourceOptions,
    FetchContext,
    ProviderProfile,
    Segment,
    WeatherParameter,
    WeatherProvider
} from '../../types';

export const METEOSTAT_CAPABILITIES: DataSourceCapabilities = {
    id: 'meteostat',
    name: 'Meteostat',
    requiresApiKey: true,
    metered: true,
    description: 'Meteostat point daily data via RapidAPI (metered)'
};

const RAPIDAPI_HOST = 'meteostat.p.rapidapi.com';

const dailyRowSchema = z.object({
    date: z.string(),
    tavg: z.unknown(),
    tmin: z.unknown(),
    tmax: z.unknown(),
    prcp: z.unknown(),
    wspd: z.unknown(),
    wpgt: z.unknown(),
    wdir: z.unknown(),
    tsun: z.unknown()
});

type DailyRow = z.infer<typeof dailyRowSchema>;

const pointDailyResponseSchema = z.object({
    data: z.array(dailyRowSchema)
});

const readers: Record<WeatherParameter, (row: DailyRow) => number | null> = {
    temperature_2m_mean: row => numberOrNull(row.tavg),
    temperature_2m_min: row => numberOrNull(row.tmin),
    temperature_2m_max: row => numberOrNull(row.tmax),
    precipitation_sum: row => numberOrNull(row.prcp),
    windspeed_10m_max: row => numberOrNull(row.wspd),
    windgusts_10m_max: row => numberOrNull(row.wpgt),
    winddirection_10m_dominant: row => numberOrNull(row.wdir),
    // minutes upstream, seconds in the series
    sunshine_duration: row => {
        const minutes = numberOrNull(row.tsun);
        return minutes === null ? null : minutes * 60;
    }
};

export class MeteostatService implements WeatherProvider {
    static readonly ID = METEOSTAT_CAPABILITIES.id;
    static readonly NAME = METEOSTAT_CAPABILITIES.name;

    readonly id = MeteostatService.ID;
    readonly name = MeteostatService.NAME;
    readonly capabilities = METEOSTAT_CAPABILITIES;
    readonly profile: ProviderProfile;

    private readonly baseUrl: string;
    private readonly apiKey: string;

    constructor(options: DataSourceOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_METEOSTAT_BASE_URL).replace(/\/+$/, '');
        this.apiKey = options.credentials?.apiKey?.trim() ?? '';
        this.profile = { ...getProviderDefinition('meteostat').defaultProfile, ...options.profile };
    }

    isAvailable(): boolean {
        return this.apiKey.length > 0;
    }

    async fetchSegment(
        segment: Segment,
        location: Coordinates,
        parameters: readonly WeatherParameter[],
        context: FetchContext
    ): Promise<DailyRecord[]> {
        if (!this.isAvailable()) {
            throw new ProviderError(this.id, 'auth', 'Meteostat API key is not configured');
        }

        let payload: unknown;
        try {
            payload = await getJson<unknown>(`${this.baseUrl}/point/daily`, {
                params: {
                    lat: location.latitude,
                    lon: location.longitude,
                    start: segment.range.start,
                    end: segment.range.end
                },
                headers: {
                    'X-RapidAPI-Key': this.apiKey,
                    'X-RapidAPI-Host': RAPIDAPI_HOST
                },
                timeout: this.profile.requestTimeoutMs,
                signal: context.signal
            });
        } catch (error) {
            throw toProviderError(this.id, error, context.signal);
        } finally {
            context.reportUsage();
        }

        return this.parseResponse(payload, parameters);
    }

    parseResponse(payload: unknown, parameters: readonly WeatherParameter[]): DailyRecord[] {
        const parsed = pointDailyResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new ProviderError(this.id, 'invalid_request', 'Meteostat response has no data array');
        }

        const records: DailyRecord[] = [];
        for (const row of parsed.data.data) {
            const date = toCalendarDate(row.date);
            if (!date) continue;
            const record = toDailyRecord(date, parameters, this.id, parameter => readers[parameter](row));
            if (record) records.push(record);
        }
        return records;
    }
}
