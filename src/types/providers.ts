export const PROVIDER_IDS = ['open-meteo', 'meteostat'] as const;

export type ProviderId = typeof PROVIDER_IDS[number];

export const PROVIDER_PREFERENCES = ['auto', ...PROVIDER_IDS] as const;

export type ProviderPreference = typeof PROVIDER_PREFERENCES[number];

export interface ProviderCredentialBlob {
    apiKey?: string;
    [key: string]: string | undefined;
}
