import { OpenMeteoService, OPEN_METEO_CAPABILITIES } from './open-meteo';
import { MeteostatService, METEOSTAT_CAPABILITIES } from './meteostat';
import type { DataSourceCapabilities, DataSourceOptions, ProviderId, WeatherProvider } from '../../types';

export interface ProviderRegistration {
    id: ProviderId;
    capabilities: DataSourceCapabilities;
    create: (options: DataSourceOptions) => WeatherProvider;
}

const providers: Record<ProviderId, ProviderRegistration> = {
    'open-meteo': {
        id: 'open-meteo',
        capabilities: OPEN_METEO_CAPABILITIES,
        create: options => new OpenMeteoService(options)
    },
    meteostat: {
        id: 'meteostat',
        capabilities: METEOSTAT_CAPABILITIES,
        create: options => new MeteostatService(options)
    }
};

export function createProvider(id: ProviderId, options: DataSourceOptions = {}): WeatherProvider {
    return providers[id].create(options);
}

export function listProviders(): ProviderRegistration[] {
    return Object.values(providers);
}

export { OpenMeteoService, MeteostatService };
