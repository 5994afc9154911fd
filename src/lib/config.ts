import { z } from 'zod';
import { ConfigError } from './errors';
import { getProviderDefinition } from './providers';
import type { ProviderCredentialBlob, ProviderId, ProviderPreference, ProviderProfile } from '../types';
import { PROVIDER_PREFERENCES } from '../types';

export const DEFAULT_USER_AGENT = 'weather-archive-downloader/0.1';
export const DEFAULT_OPEN_METEO_ARCHIVE_URL = 'https://archive-api.open-meteo.com/v1';
export const DEFAULT_METEOSTAT_BASE_URL = 'https://meteostat.p.rapidapi.com';

const optionalString = z
    .string()
    .trim()
    .transform(value => (value === '' ? undefined : value))
    .optional();

const envSchema = z.object({
    METEOSTAT_API_KEY: optionalString,
    WEATHER_PROVIDER: z.enum(PROVIDER_PREFERENCES).default('auto'),
    WEATHER_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
    WEATHER_MAX_RANGE_YEARS: z.coerce.number().int().min(1).max(200).default(75),
    WEATHER_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    OPEN_METEO_ARCHIVE_URL: z.string().url().default(DEFAULT_OPEN_METEO_ARCHIVE_URL),
    METEOSTAT_BASE_URL: z.string().url().default(DEFAULT_METEOSTAT_BASE_URL),
    METEOSTAT_MONTHLY_LIMIT: z.coerce.number().int().min(0).optional(),
    METEOSTAT_USED_THIS_WINDOW: z.coerce.number().int().min(0).default(0)
});

export interface ProviderConfig {
    baseUrl: string;
    credentials: ProviderCredentialBlob;
    profile: ProviderProfile;
    /** Calls already spent in the current quota window before this process started. */
    usedThisWindow: number;
}

export interface EngineConfig {
    preference: ProviderPreference;
    maxConcurrency: number;
    maxRangeYears: number;
    userAgent: string;
    providers: Record<ProviderId, ProviderConfig>;
}

/**
 * Builds the engine configuration from environment variables. Every invalid
 * key is reported in one ConfigError.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
    }
    const values = parsed.data;

    const meteostatProfile = getProviderDefinition('meteostat').defaultProfile;
    const meteostatQuota = meteostatProfile.quota && values.METEOSTAT_MONTHLY_LIMIT !== undefined
        ? { ...meteostatProfile.quota, capacity: values.METEOSTAT_MONTHLY_LIMIT }
        : meteostatProfile.quota;

    return {
        preference: values.WEATHER_PROVIDER,
        maxConcurrency: values.WEATHER_MAX_CONCURRENCY,
        maxRangeYears: values.WEATHER_MAX_RANGE_YEARS,
        userAgent: values.WEATHER_USER_AGENT,
        providers: {
            'open-meteo': {
                baseUrl: values.OPEN_METEO_ARCHIVE_URL,
                credentials: {},
                profile: getProviderDefinition('open-meteo').defaultProfile,
                usedThisWindow: 0
            },
            meteostat: {
                baseUrl: values.METEOSTAT_BASE_URL,
                credentials: { apiKey: values.METEOSTAT_API_KEY },
                profile: { ...meteostatProfile, quota: meteostatQuota },
                usedThisWindow: values.METEOSTAT_USED_THIS_WINDOW
            }
        }
    };
}
