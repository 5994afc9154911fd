export * from './types';
export * from './lib/errors';
export { loadConfig } from './lib/config';
export type { EngineConfig, ProviderConfig } from './lib/config';
export { PROVIDERS, getProviderDefinition, hasRequiredCredentials, missingCredentialFields } from './lib/providers';
export { rangeEndingToday } from './lib/dateUtils';
export { seriesToCsv, gapsToCsv, exportFileName } from './lib/export';
export { planSegments, splitRange } from './services/planner';
export { QuotaTracker, warningLevelFor } from './services/quota';
export type { QuotaPermit } from './services/quota';
export { RetryPolicy } from './services/retry';
export type { RetryOptions, RetryDecision } from './services/retry';
export { FetchCoordinator } from './services/coordinator';
export type { FetchTarget, ExecuteOptions } from './services/coordinator';
export { mergeOutcomes } from './services/merger';
export { WeatherArchive, fetchRequestSchema } from './services/archive';
export type {
    AcquisitionHandle,
    AcquisitionResult,
    AcquisitionStatus,
    FetchRequestInput,
    ProviderStatus,
    SubmitOptions
} from './services/archive';
export { createWeatherArchive } from './services/dataSourceFactory';
export { createProvider, listProviders, OpenMeteoService, MeteostatService } from './services/providers';
