import { z } from 'zod';
import { DEFAULT_OPEN_METEO_ARCHIVE_URL } from '../../lib/config';
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

export const OPEN_METEO_CAPABILITIES: DataSourceCapabilities = {
    id: 'open-meteo',
    name: 'Open-Meteo',
    requiresApiKey: false,
    metered: false,
    description: 'Open-Meteo historical weather archive (ERA5 reanalysis, daily aggregates)'
};

/** Archive daily variable names; the legacy spellings are still served. */
const DAILY_VARIABLES: Record<WeatherParameter, string> = {
    temperature_2m_max: 'temperature_2m_max',
    temperature_2m_min: 'temperature_2m_min',
    temperature_2m_mean: 'temperature_2m_mean',
    precipitation_sum: 'precipitation_sum',
    windspeed_10m_max: 'windspeed_10m_max',
    windgusts_10m_max: 'windgusts_10m_max',
    winddirection_10m_dominant: 'winddirection_10m_dominant',
    sunshine_duration: 'sunshine_duration'
};

const archiveResponseSchema = z.object({
    daily: z.object({ time: z.array(z.string()) }).passthrough()
});

export class OpenMeteoService implements WeatherProvider {
    static readonly ID = OPEN_METEO_CAPABILITIES.id;
    static readonly NAME = OPEN_METEO_CAPABILITIES.name;

    readonly id = OpenMeteoService.ID;
    readonly name = OpenMeteoService.NAME;
    readonly capabilities = OPEN_METEO_CAPABILITIES;
    readonly profile: ProviderProfile;

    private readonly baseUrl: string;

    constructor(options: DataSourceOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_OPEN_METEO_ARCHIVE_URL).replace(/\/+$/, '');
        this.profile = { ...getProviderDefinition('open-meteo').defaultProfile, ...options.profile };
    }

    isAvailable(): boolean {
        return true;
    }

    async fetchSegment(
        segment: Segment,
        location: Coordinates,
        parameters: readonly WeatherParameter[],
        context: FetchContext
    ): Promise<DailyRecord[]> {
        let payload: unknown;
        try {
            payload = await getJson<unknown>(`${this.baseUrl}/archive`, {
                params: {
                    latitude: location.latitude,
                    longitude: location.longitude,
                    start_date: segment.range.start,
                    end_date: segment.range.end,
                    daily: parameters.map(p => DAILY_VARIABLES[p]).join(','),
                    timezone: 'auto'
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
        const parsed = archiveResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new ProviderError(this.id, 'invalid_request', 'Open-Meteo response has no daily block');
        }

        const { daily } = parsed.data;
        const columns = new Map<WeatherParameter, unknown[]>();
        for (const parameter of parameters) {
            const column = daily[DAILY_VARIABLES[parameter]];
            if (Array.isArray(column)) {
                columns.set(parameter, column);
            } else {
                console.warn(`[WeatherArchive] Open-Meteo omitted ${parameter}; filling with nulls`);
            }
        }

        const records: DailyRecord[] = [];
        daily.time.forEach((time, index) => {
            const date = toCalendarDate(time);
            if (!date) return;
            const record = toDailyRecord(date, parameters, this.id, parameter =>
                numberOrNull(columns.get(parameter)?.[index])
            );
            if (record) records.push(record);
        });
        return records;
    }
}
