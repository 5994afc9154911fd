import type { ProviderCredentialBlob, ProviderId, ProviderProfile } from '../types';

export interface ProviderField {
    key: keyof ProviderCredentialBlob | string;
    label: string;
    envVar: string;
    optional?: boolean;
}

export interface ProviderDefinition {
    id: ProviderId;
    name: string;
    credentialFields: ProviderField[];
    defaultProfile: ProviderProfile;
}

export const PROVIDERS: ProviderDefinition[] = [
    {
        id: 'open-meteo',
        name: 'Open-Meteo Historical Weather',
        credentialFields: [],
        defaultProfile: {
            maxSpanDays: 365,
            maxConcurrent: 8,
            // 100 requests per minute
            minRequestIntervalMs: 600,
            quota: null,
            baseRetryDelayMs: 1000,
            maxAttempts: 3,
            // Multi-month archive queries can take a while to assemble upstream.
            requestTimeoutMs: 60_000
        }
    },
    {
        id: 'meteostat',
        name: 'Meteostat (RapidAPI)',
        credentialFields: [
            {
                key: 'apiKey',
                label: 'RapidAPI Key',
                envVar: 'METEOSTAT_API_KEY'
            }
        ],
        defaultProfile: {
            maxSpanDays: 90,
            maxConcurrent: 5,
            minRequestIntervalMs: 100,
            quota: { capacity: 10_000, windowDays: 30 },
            baseRetryDelayMs: 500,
            maxAttempts: 3,
            requestTimeoutMs: 30_000
        }
    }
];

export function getProviderDefinition(id: ProviderId): ProviderDefinition {
    const definition = PROVIDERS.find(p => p.id === id);
    if (!definition) {
        throw new Error(`Unknown provider: ${id}`);
    }
    return definition;
}

export function missingCredentialFields(providerId: ProviderId, credentials: ProviderCredentialBlob): ProviderField[] {
    return getProviderDefinition(providerId).credentialFields.filter(
        field => !field.optional && !String(credentials[field.key] ?? '').trim()
    );
}

export function hasRequiredCredentials(providerId: ProviderId, credentials: ProviderCredentialBlob): boolean {
    return missingCredentialFields(providerId, credentials).length === 0;
}
