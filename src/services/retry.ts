import type { FailureKind, ProviderProfile } from '../types';

export interface RetryOptions {
    maxAttempts: number;
    baseDelayMs: number;
    factor: number;
    maxDelayMs: number;
    /** Fraction of the delay randomly added or removed, 0..1. */
    jitterRatio: number;
    random: () => number;
}

export interface RetryDecision {
    retry: boolean;
    delayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    factor: 2,
    maxDelayMs: 30_000,
    jitterRatio: 0.2,
    random: Math.random
};

const RETRYABLE: ReadonlySet<FailureKind> = new Set(['transient', 'rate_limited']);

export function isRetryable(kind: FailureKind): boolean {
    return RETRYABLE.has(kind);
}

/**
 * Provider-agnostic backoff. Delays grow by `factor` per attempt, spread by
 * jitter so concurrent segments do not retry in lockstep, and are capped at
 * `maxDelayMs`. A server Retry-After hint raises the delay but never past
 * the cap.
 */
export class RetryPolicy {
    readonly options: RetryOptions;

    constructor(options: Partial<RetryOptions> = {}) {
        this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    }

    static forProfile(profile: ProviderProfile, overrides: Partial<RetryOptions> = {}): RetryPolicy {
        return new RetryPolicy({
            maxAttempts: profile.maxAttempts,
            baseDelayMs: profile.baseRetryDelayMs,
            ...overrides
        });
    }

    /**
     * @param attemptNumber 1-based number of the attempt that just failed.
     * @param retryAfterMs Delay the provider asked for, if any.
     */
    shouldRetry(attemptNumber: number, kind: FailureKind, retryAfterMs?: number): RetryDecision {
        if (!isRetryable(kind) || attemptNumber >= this.options.maxAttempts) {
            return { retry: false, delayMs: 0 };
        }
        return { retry: true, delayMs: this.delayFor(attemptNumber, retryAfterMs) };
    }

    delayFor(attemptNumber: number, retryAfterMs?: number): number {
        const { baseDelayMs, factor, maxDelayMs, jitterRatio, random } = this.options;
        const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(factor, attemptNumber - 1));
        const jitter = exponential * jitterRatio * (random() * 2 - 1);
        const delay = Math.max(exponential + jitter, retryAfterMs ?? 0);
        return Math.round(Math.min(maxDelayMs, Math.max(0, delay)));
    }
}
