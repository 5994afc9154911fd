import type { Coordinates, DailyRecord, Segment, WeatherParameter } from './index';
import type { ProviderId } from './providers';

export interface QuotaProfile {
    /** Calls allowed per window. */
    capacity: number;
    windowDays: number;
}

/**
 * Per-provider limits. Read-only after startup; shared by every acquisition.
 */
export interface ProviderProfile {
    maxSpanDays: number;
    maxConcurrent: number;
    /** Minimum spacing between successive calls to the provider. */
    minRequestIntervalMs: number;
    quota: QuotaProfile | null;
    baseRetryDelayMs: number;
    maxAttempts: number;
    requestTimeoutMs: number;
}

export interface DataSourceCapabilities {
    id: ProviderId;
    name: string;
    requiresApiKey: boolean;
    metered: boolean;
    description?: string;
}

export interface ProviderCredentials {
    apiKey?: string;
}

export interface DataSourceOptions {
    credentials?: ProviderCredentials;
    baseUrl?: string;
    profile?: Partial<ProviderProfile>;
}

export interface FetchContext {
    signal?: AbortSignal;
    /** Called once per physical HTTP call, whatever its result. */
    reportUsage: () => void;
}

export interface WeatherProvider {
    readonly id: ProviderId;
    readonly name: string;
    readonly capabilities: DataSourceCapabilities;
    readonly profile: ProviderProfile;

    isAvailable(): boolean;
    fetchSegment(
        segment: Segment,
        location: Coordinates,
        parameters: readonly WeatherParameter[],
        context: FetchContext
    ): Promise<DailyRecord[]>;
}
