import { loadConfig, type EngineConfig } from '../lib/config';
import { getProviderDefinition, missingCredentialFields } from '../lib/providers';
import { PROVIDER_IDS } from '../types';
import type { ProviderId, ProviderProfile } from '../types';
import { WeatherArchive } from './archive';
import { setUserAgent } from './http';
import { listProviders } from './providers';
import { QuotaTracker } from './quota';

/**
 * Builds a ready archive from configuration: one client per provider, a
 * quota tracker seeded with usage carried over from earlier runs, and the
 * configured default preference.
 */
export function createWeatherArchive(config: EngineConfig = loadConfig()): WeatherArchive {
    setUserAgent(config.userAgent);

    const providers = listProviders().map(({ id, create }) => {
        const { baseUrl, credentials, profile } = config.providers[id];
        const missing = missingCredentialFields(id, credentials);
        if (missing.length > 0) {
            const vars = missing.map(field => `${field.envVar} (${field.label})`).join(', ');
            console.warn(`[WeatherArchive] ${getProviderDefinition(id).name} disabled: set ${vars}`);
        }
        return create({ baseUrl, credentials, profile });
    });

    const profiles: Record<ProviderId, ProviderProfile> = {
        'open-meteo': config.providers['open-meteo'].profile,
        meteostat: config.providers.meteostat.profile
    };
    const quota = new QuotaTracker(profiles);
    for (const id of PROVIDER_IDS) {
        const used = config.providers[id].usedThisWindow;
        if (used > 0) quota.seedUsage(id, used);
    }

    return new WeatherArchive({
        providers,
        quota,
        defaultProvider: config.preference,
        maxConcurrency: config.maxConcurrency,
        maxRangeYears: config.maxRangeYears
    });
}
