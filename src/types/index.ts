import type { ProviderId, ProviderPreference } from './providers';

export * from './providers';
export * from './data-source';

export const WEATHER_PARAMETERS = [
    'temperature_2m_max',
    'temperature_2m_min',
    'temperature_2m_mean',
    'precipitation_sum',
    'windspeed_10m_max',
    'windgusts_10m_max',
    'winddirection_10m_dominant',
    'sunshine_duration'
] as const;

export type WeatherParameter = typeof WEATHER_PARAMETERS[number];

export interface Coordinates {
    latitude: number;
    longitude: number;
}

/** Inclusive range of ISO calendar dates (YYYY-MM-DD). */
export interface DateRange {
    start: string;
    end: string;
}

export interface FetchRequest {
    location: Coordinates;
    parameters: readonly WeatherParameter[];
    range: DateRange;
    provider: ProviderPreference;
}

/** A request as held after submission: frozen all the way down. */
export type SubmittedRequest = Readonly<{
    location: Readonly<Coordinates>;
    parameters: readonly WeatherParameter[];
    range: Readonly<DateRange>;
    provider: ProviderPreference;
}>;

export interface Segment {
    index: number;
    range: DateRange;
    providerOrder: readonly ProviderId[];
}

export interface DailyRecord {
    date: string;
    values: Partial<Record<WeatherParameter, number | null>>;
    source: ProviderId;
}

export type ProviderErrorKind = 'transient' | 'rate_limited' | 'invalid_request' | 'auth';

/** `internal` marks a fault inside the engine rather than a provider answer. */
export type FailureKind = ProviderErrorKind | 'quota_exhausted' | 'internal';

export interface ProviderAttempt {
    providerId: ProviderId;
    calls: number;
    outcome: 'success' | FailureKind | 'cancelled';
}

export type SegmentOutcome =
    | { status: 'success'; segment: Segment; providerId: ProviderId; records: DailyRecord[]; attempts: ProviderAttempt[] }
    | { status: 'failed'; segment: Segment; error: FailureKind; attempts: ProviderAttempt[] }
    | { status: 'cancelled'; segment: Segment; attempts: ProviderAttempt[] };

export type GapReason = 'quota_exhausted' | 'all_providers_failed' | 'internal_error' | 'cancelled' | 'no_data';

export interface GapRange {
    start: string;
    end: string;
    days: number;
    reason: GapReason;
}

export interface MergedSeries {
    range: DateRange;
    records: DailyRecord[];
    missingDates: string[];
    gaps: GapRange[];
    /** Share of days in the range that have a record, 0..1. */
    coverage: number;
}

export type ProgressEvent =
    | { type: 'segment_started'; segment: Segment; completed: number; failed: number; total: number }
    | { type: 'segment_completed'; segment: Segment; providerId: ProviderId; completed: number; failed: number; total: number }
    | { type: 'segment_failed'; segment: Segment; error: FailureKind; completed: number; failed: number; total: number }
    | { type: 'provider_fallback'; segment: Segment; from: ProviderId; to: ProviderId; reason: FailureKind; completed: number; failed: number; total: number };

export type ProgressListener = (event: ProgressEvent) => void;

export type UsageWarningLevel = 'normal' | 'info' | 'warning' | 'critical' | 'exhausted';

export interface QuotaState {
    providerId: ProviderId;
    used: number;
    /** Null when the provider has no periodic quota. */
    capacity: number | null;
    remaining: number | null;
    inFlight: number;
    windowStartedAt: string | null;
    windowResetsAt: string | null;
    warningLevel: UsageWarningLevel;
}
