import pLimit from 'p-limit';
import { sleep, throwIfAborted, whenAborted } from '../lib/async';
import { daysInRange } from '../lib/dateUtils';
import { CancelledError, QuotaExceededError, isCancelledError, type ProviderError } from '../lib/errors';
import { toProviderError } from './http';
import { splitRange } from './planner';
import { RetryPolicy, type RetryOptions } from './retry';
import type { QuotaTracker } from './quota';
import type {
    Coordinates,
    DailyRecord,
    FailureKind,
    ProgressEvent,
    ProgressListener,
    ProviderAttempt,
    ProviderId,
    Segment,
    SegmentOutcome,
    WeatherParameter,
    WeatherProvider
} from '../types';

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface CoordinatorOptions {
    providers: readonly WeatherProvider[];
    quota: QuotaTracker;
    /** Upper bound on segments in flight, before provider caps apply. */
    maxConcurrency?: number;
    /** Applied on top of each provider's retry profile. */
    retry?: Partial<RetryOptions>;
}

export interface FetchTarget {
    location: Coordinates;
    parameters: readonly WeatherParameter[];
}

export interface ExecuteOptions {
    signal?: AbortSignal;
    onProgress?: ProgressListener;
}

type ProviderResult =
    | { ok: true; records: DailyRecord[]; attempt: ProviderAttempt }
    | { ok: false; kind: FailureKind; attempt: ProviderAttempt };

type Counts = Pick<ProgressEvent, 'completed' | 'failed' | 'total'>;

/**
 * Drives planned segments through a bounded worker pool. For each segment it
 * walks the provider order, retrying retryable failures per RetryPolicy and
 * falling back to the next provider when one gives up. It is the only place
 * that decides between retry and fallback.
 */
export class FetchCoordinator {
    private readonly providers = new Map<ProviderId, WeatherProvider>();
    private readonly quota: QuotaTracker;
    private readonly maxConcurrency: number;
    private readonly retryOverrides: Partial<RetryOptions>;

    constructor(options: CoordinatorOptions) {
        for (const provider of options.providers) {
            this.providers.set(provider.id, provider);
        }
        this.quota = options.quota;
        this.maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
        this.retryOverrides = options.retry ?? {};
    }

    /**
     * Resolves with outcomes in ascending date order. Never rejects: provider
     * failures become `failed` outcomes, and once `signal` aborts it resolves
     * straight away with every unfinished segment marked `cancelled`.
     */
    async execute(segments: readonly Segment[], target: FetchTarget, options: ExecuteOptions = {}): Promise<SegmentOutcome[]> {
        const { signal, onProgress } = options;
        const results: (SegmentOutcome[] | undefined)[] = new Array(segments.length);
        const counts: Counts = { completed: 0, failed: 0, total: segments.length };
        let settled = false;

        const emit = (event: ProgressEvent) => {
            if (settled || !onProgress) return;
            try {
                onProgress(event);
            } catch (error) {
                console.error('[WeatherArchive] Progress listener threw', error);
            }
        };

        const runSegment = async (segment: Segment, position: number) => {
            if (signal?.aborted) return;
            emit({ type: 'segment_started', segment, ...counts });

            let outcomes: SegmentOutcome[];
            try {
                outcomes = await this.runCandidates(segment, this.candidatesFor(segment), [], target, signal, emit, counts);
            } catch (error) {
                if (isCancelledError(error)) return;
                console.error(`[WeatherArchive] Segment ${segment.range.start}..${segment.range.end} aborted unexpectedly`, error);
                outcomes = [{ status: 'failed', segment, error: 'internal', attempts: [] }];
            }
            if (signal?.aborted) return;

            results[position] = outcomes;
            const failure = outcomes.find(outcome => outcome.status === 'failed');
            if (failure && failure.status === 'failed') {
                counts.failed += 1;
                emit({ type: 'segment_failed', segment, error: failure.error, ...counts });
            } else {
                counts.completed += 1;
                const success = outcomes.find(outcome => outcome.status === 'success');
                if (success && success.status === 'success') {
                    emit({ type: 'segment_completed', segment, providerId: success.providerId, ...counts });
                }
            }
        };

        const limit = pLimit(Math.max(1, Math.min(segments.length, this.poolSizeFor(segments))));
        const pool = Promise.all(segments.map((segment, position) => limit(runSegment, segment, position)));
        if (signal) {
            const aborted = whenAborted(signal);
            try {
                await Promise.race([pool, aborted.promise]);
            } finally {
                aborted.dispose();
            }
        } else {
            await pool;
        }
        settled = true;
        limit.clearQueue();

        return segments.flatMap((segment, position): SegmentOutcome[] =>
            results[position] ?? [{ status: 'cancelled', segment, attempts: [] }]
        );
    }

    private poolSizeFor(segments: readonly Segment[]): number {
        const caps = new Set<number>();
        for (const segment of segments) {
            for (const id of this.candidatesFor(segment)) {
                const provider = this.providers.get(id);
                if (provider) caps.add(provider.profile.maxConcurrent);
            }
        }
        return Math.min(this.maxConcurrency, ...caps);
    }

    private candidatesFor(segment: Segment): ProviderId[] {
        return segment.providerOrder.filter(id => this.providers.has(id));
    }

    /**
     * Tries `candidates` in order. A candidate whose span is shorter than the
     * segment gets the segment in pieces, each of which walks the remaining
     * candidates on its own, so one planned segment may yield several
     * outcomes.
     */
    private async runCandidates(
        segment: Segment,
        candidates: readonly ProviderId[],
        prior: readonly ProviderAttempt[],
        target: FetchTarget,
        signal: AbortSignal | undefined,
        emit: (event: ProgressEvent) => void,
        counts: Counts
    ): Promise<SegmentOutcome[]> {
        const attempts = [...prior];
        let failure: FailureKind | null = null;

        for (const [index, id] of candidates.entries()) {
            const provider = this.providers.get(id);
            if (!provider) continue;

            if (failure !== null && index > 0) {
                const from = candidates[index - 1];
                console.warn(`[WeatherArchive] ${from} gave up on ${segment.range.start}..${segment.range.end} (${failure}); falling back to ${id}`);
                emit({ type: 'provider_fallback', segment, from, to: id, reason: failure, ...counts });
            }

            if (daysInRange(segment.range) > provider.profile.maxSpanDays) {
                const outcomes: SegmentOutcome[] = [];
                for (const range of splitRange(segment.range, provider.profile.maxSpanDays)) {
                    throwIfAborted(signal);
                    const piece: Segment = { ...segment, range };
                    outcomes.push(...await this.runCandidates(piece, candidates.slice(index), attempts, target, signal, emit, counts));
                }
                return outcomes;
            }

            const result = await this.fetchWithRetry(provider, segment, target, signal);
            attempts.push(result.attempt);
            if (result.ok) {
                return [{ status: 'success', segment, providerId: id, records: result.records, attempts }];
            }
            failure = result.kind;
        }

        return [{ status: 'failed', segment, error: failure ?? 'internal', attempts }];
    }

    private async fetchWithRetry(
        provider: WeatherProvider,
        segment: Segment,
        target: FetchTarget,
        signal: AbortSignal | undefined
    ): Promise<ProviderResult> {
        const policy = RetryPolicy.forProfile(provider.profile, this.retryOverrides);
        let calls = 0;

        for (let attemptNumber = 1; ; attemptNumber++) {
            let failure: ProviderError;
            try {
                const records = await this.quota.withPermit(provider.id, signal, permit => {
                    let reported = false;
                    const reportUsage = () => {
                        if (reported) return;
                        reported = true;
                        calls += 1;
                        permit.recordUsage();
                    };
                    return provider.fetchSegment(segment, target.location, target.parameters, { signal, reportUsage });
                });
                return { ok: true, records, attempt: { providerId: provider.id, calls, outcome: 'success' } };
            } catch (error) {
                if (error instanceof QuotaExceededError) {
                    console.warn(`[WeatherArchive] ${error.message}`);
                    return { ok: false, kind: 'quota_exhausted', attempt: { providerId: provider.id, calls, outcome: 'quota_exhausted' } };
                }
                const classified = toProviderError(provider.id, error, signal);
                if (classified instanceof CancelledError) throw classified;
                failure = classified;
                console.warn(`[WeatherArchive] ${failure.message}`);
            }

            const decision = policy.shouldRetry(attemptNumber, failure.kind, failure.retryAfterMs);
            if (!decision.retry) {
                return { ok: false, kind: failure.kind, attempt: { providerId: provider.id, calls, outcome: failure.kind } };
            }
            console.warn(`[WeatherArchive] Retrying ${provider.id} for ${segment.range.start}..${segment.range.end} in ${decision.delayMs}ms (attempt ${attemptNumber + 1}/${policy.options.maxAttempts})`);
            await sleep(decision.delayMs, signal);
        }
    }
}
