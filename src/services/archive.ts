import { z } from 'zod';
import { isIsoDate } from '../lib/dateUtils';
import { AcquisitionFailedError, NoProviderAvailableError, RequestValidationError } from '../lib/errors';
import { getProviderDefinition } from '../lib/providers';
import { FetchCoordinator } from './coordinator';
import { mergeOutcomes } from './merger';
import { DEFAULT_MAX_RANGE_YEARS, planSegments } from './planner';
import { QuotaTracker } from './quota';
import type { RetryOptions } from './retry';
import { PROVIDER_IDS, PROVIDER_PREFERENCES, WEATHER_PARAMETERS } from '../types';
import type {
    MergedSeries,
    ProgressListener,
    ProviderId,
    ProviderPreference,
    ProviderProfile,
    Segment,
    SegmentOutcome,
    SubmittedRequest,
    UsageWarningLevel,
    WeatherProvider
} from '../types';

const isoDate = z.string().refine(isIsoDate, { message: 'must be a YYYY-MM-DD calendar date' });

export const fetchRequestSchema = z.object({
    location: z.object({
        latitude: z.number().min(-90).max(90),
        longitude: z.number().min(-180).max(180)
    }),
    parameters: z
        .array(z.enum(WEATHER_PARAMETERS))
        .min(1, 'at least one parameter is required')
        .transform(parameters => [...new Set(parameters)]),
    range: z.object({ start: isoDate, end: isoDate }),
    provider: z.enum(PROVIDER_PREFERENCES).default('auto')
});

export type FetchRequestInput = z.input<typeof fetchRequestSchema>;

export interface SubmitOptions {
    signal?: AbortSignal;
    onProgress?: ProgressListener;
}

export type AcquisitionResult =
    | { status: 'complete' | 'partial' | 'cancelled'; series: MergedSeries; outcomes: SegmentOutcome[] }
    | { status: 'failed'; error: AcquisitionFailedError; series: MergedSeries; outcomes: SegmentOutcome[] };

export type AcquisitionStatus = AcquisitionResult['status'];

export interface AcquisitionHandle {
    readonly id: string;
    readonly request: SubmittedRequest;
    readonly providerOrder: readonly ProviderId[];
    readonly segments: readonly Segment[];
    /** Settles once; never rejects. */
    readonly result: Promise<AcquisitionResult>;
    readonly cancelled: boolean;
    cancel(): void;
}

export interface ProviderStatus {
    id: ProviderId;
    name: string;
    available: boolean;
    metered: boolean;
    usedThisWindow: number;
    capacity: number | null;
    remaining: number | null;
    warningLevel: UsageWarningLevel;
    windowResetsAt: string | null;
    lastUsed: boolean;
}

export interface WeatherArchiveOptions {
    providers: readonly WeatherProvider[];
    /** Shared across archives that must respect the same budgets. */
    quota?: QuotaTracker;
    defaultProvider?: ProviderPreference;
    maxConcurrency?: number;
    maxRangeYears?: number;
    retry?: Partial<RetryOptions>;
}

let sequence = 0;

/**
 * Entry point for acquisitions. `submit` validates and plans synchronously,
 * then hands back a handle whose `result` settles in the background.
 */
export class WeatherArchive {
    readonly quota: QuotaTracker;

    private readonly providers = new Map<ProviderId, WeatherProvider>();
    private readonly profiles: Record<ProviderId, ProviderProfile>;
    private readonly coordinator: FetchCoordinator;
    private readonly defaultProvider: ProviderPreference;
    private readonly maxRangeYears: number;
    private lastUsedProvider: ProviderId | null = null;

    constructor(options: WeatherArchiveOptions) {
        for (const provider of options.providers) {
            this.providers.set(provider.id, provider);
        }
        this.profiles = {
            'open-meteo': this.profileOf('open-meteo'),
            meteostat: this.profileOf('meteostat')
        };
        this.quota = options.quota ?? new QuotaTracker(this.profiles);
        this.coordinator = new FetchCoordinator({
            providers: options.providers,
            quota: this.quota,
            maxConcurrency: options.maxConcurrency,
            retry: options.retry
        });
        this.defaultProvider = options.defaultProvider ?? 'auto';
        this.maxRangeYears = options.maxRangeYears ?? DEFAULT_MAX_RANGE_YEARS;
    }

    submit(input: FetchRequestInput, options: SubmitOptions = {}): AcquisitionHandle {
        const parsed = fetchRequestSchema.safeParse(input);
        if (!parsed.success) {
            throw new RequestValidationError(
                parsed.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
            );
        }
        const { location, parameters, range } = parsed.data;
        const request: SubmittedRequest = Object.freeze({
            location: Object.freeze({ latitude: location.latitude, longitude: location.longitude }),
            parameters: Object.freeze([...parameters]),
            range: Object.freeze({ start: range.start, end: range.end }),
            provider: input.provider === undefined ? this.defaultProvider : parsed.data.provider
        });

        const providerOrder = this.resolveProviderOrder(request.provider);
        if (providerOrder.length === 0) {
            throw new NoProviderAvailableError(`No available provider for preference "${request.provider}"`);
        }
        const segments = planSegments(request, providerOrder, this.profiles, { maxRangeYears: this.maxRangeYears });

        const controller = new AbortController();
        const external = options.signal;
        const onExternalAbort = () => controller.abort();
        if (external?.aborted) {
            controller.abort();
        } else {
            external?.addEventListener('abort', onExternalAbort, { once: true });
        }

        const id = `acq-${++sequence}`;
        console.log(
            `[WeatherArchive] Acquisition ${id}: ${request.range.start}..${request.range.end} ` +
            `in ${segments.length} segment(s) via ${providerOrder.join(' -> ')}`
        );

        return {
            id,
            request,
            providerOrder,
            segments,
            result: this.run(id, request, segments, controller.signal, options.onProgress).finally(() =>
                external?.removeEventListener('abort', onExternalAbort)
            ),
            get cancelled() {
                return controller.signal.aborted;
            },
            cancel: () => {
                if (controller.signal.aborted) return;
                console.log(`[WeatherArchive] Acquisition ${id} cancelled`);
                controller.abort();
            }
        };
    }

    cancel(handle: AcquisitionHandle): void {
        handle.cancel();
    }

    /**
     * `auto` puts free providers ahead of metered ones; an explicit choice goes
     * first with the others kept as fallbacks. Unavailable providers are left out.
     */
    resolveProviderOrder(preference: ProviderPreference = this.defaultProvider): ProviderId[] {
        const byCost = [...PROVIDER_IDS].sort(
            (a, b) => Number(this.isMetered(a)) - Number(this.isMetered(b))
        );
        const ordered = preference === 'auto' ? byCost : [preference, ...byCost.filter(id => id !== preference)];

        return ordered.filter(id => {
            const provider = this.providers.get(id);
            if (!provider) return false;
            if (!provider.isAvailable()) {
                console.warn(`[WeatherArchive] Skipping ${provider.name}: missing credentials`);
                return false;
            }
            return true;
        });
    }

    getProviderStatus(): ProviderStatus[] {
        return [...this.providers.values()].map(provider => {
            const state = this.quota.stateOf(provider.id);
            return {
                id: provider.id,
                name: provider.name,
                available: provider.isAvailable(),
                metered: provider.capabilities.metered,
                usedThisWindow: state.used,
                capacity: state.capacity,
                remaining: state.remaining,
                warningLevel: state.warningLevel,
                windowResetsAt: state.windowResetsAt,
                lastUsed: this.lastUsedProvider === provider.id
            };
        });
    }

    private async run(
        id: string,
        request: SubmittedRequest,
        segments: readonly Segment[],
        signal: AbortSignal,
        onProgress?: ProgressListener
    ): Promise<AcquisitionResult> {
        const outcomes = await this.coordinator.execute(segments, request, { signal, onProgress });

        let series: MergedSeries;
        try {
            series = mergeOutcomes(outcomes, request.range);
        } catch (error) {
            console.error(`[WeatherArchive] Acquisition ${id} could not be merged`, error);
            const failure = new AcquisitionFailedError(error instanceof Error ? error.message : 'Merge failed');
            const whole: SegmentOutcome = {
                status: 'failed',
                segment: { index: 0, range: request.range, providerOrder: [] },
                error: 'internal',
                attempts: []
            };
            return { status: 'failed', error: failure, series: mergeOutcomes([whole], request.range), outcomes };
        }

        for (const outcome of outcomes) {
            if (outcome.status === 'success') this.lastUsedProvider = outcome.providerId;
        }

        const summary = `${series.records.length}/${series.records.length + series.missingDates.length} days, ${series.gaps.length} gap(s)`;
        if (signal.aborted) {
            console.log(`[WeatherArchive] Acquisition ${id} stopped after cancellation: ${summary}`);
            return { status: 'cancelled', series, outcomes };
        }
        if (!outcomes.some(outcome => outcome.status === 'success')) {
            const error = new AcquisitionFailedError(`All ${outcomes.length} segment(s) failed on every provider`);
            console.error(`[WeatherArchive] Acquisition ${id} failed: ${error.message}`);
            return { status: 'failed', error, series, outcomes };
        }
        const status = series.missingDates.length === 0 ? 'complete' : 'partial';
        console.log(`[WeatherArchive] Acquisition ${id} ${status}: ${summary}`);
        return { status, series, outcomes };
    }

    private profileOf(id: ProviderId): ProviderProfile {
        return this.providers.get(id)?.profile ?? getProviderDefinition(id).defaultProfile;
    }

    private isMetered(id: ProviderId): boolean {
        return this.providers.get(id)?.capabilities.metered ?? getProviderDefinition(id).defaultProfile.quota !== null;
    }
}
