import { describe, expect, it } from 'vitest';
import { getProviderDefinition } from '../lib/providers';
import { RetryPolicy, isRetryable } from './retry';

const noJitter = () => 0.5;

describe('RetryPolicy', () => {
    it('retries only transient and rate-limited failures', () => {
        expect(isRetryable('transient')).toBe(true);
        expect(isRetryable('rate_limited')).toBe(true);
        expect(isRetryable('invalid_request')).toBe(false);
        expect(isRetryable('auth')).toBe(false);
        expect(isRetryable('quota_exhausted')).toBe(false);
    });

    it('backs off exponentially until the attempt budget is spent', () => {
        const policy = new RetryPolicy({ random: noJitter });

        expect(policy.shouldRetry(1, 'transient')).toEqual({ retry: true, delayMs: 1000 });
        expect(policy.shouldRetry(2, 'transient')).toEqual({ retry: true, delayMs: 2000 });
        expect(policy.shouldRetry(3, 'transient')).toEqual({ retry: false, delayMs: 0 });
    });

    it('never retries a permanent failure', () => {
        const policy = new RetryPolicy({ random: noJitter });

        expect(policy.shouldRetry(1, 'auth')).toEqual({ retry: false, delayMs: 0 });
        expect(policy.shouldRetry(1, 'invalid_request')).toEqual({ retry: false, delayMs: 0 });
    });

    it('spreads delays by the jitter ratio', () => {
        expect(new RetryPolicy({ random: () => 0 }).delayFor(1)).toBe(800);
        expect(new RetryPolicy({ random: () => 1 }).delayFor(1)).toBe(1200);
    });

    it('caps the delay', () => {
        const policy = new RetryPolicy({ random: () => 1, maxAttempts: 20 });

        expect(policy.delayFor(10)).toBe(30_000);
    });

    it('waits at least as long as Retry-After asks, up to the cap', () => {
        const policy = new RetryPolicy({ random: noJitter });

        expect(policy.shouldRetry(1, 'rate_limited', 5000)).toEqual({ retry: true, delayMs: 5000 });
        expect(policy.shouldRetry(1, 'rate_limited', 120_000)).toEqual({ retry: true, delayMs: 30_000 });
        expect(policy.shouldRetry(2, 'rate_limited', 10)).toEqual({ retry: true, delayMs: 2000 });
    });

    it('takes base delay and attempts from a provider profile', () => {
        const profile = getProviderDefinition('meteostat').defaultProfile;
        const policy = RetryPolicy.forProfile(profile, { random: noJitter });

        expect(policy.options.maxAttempts).toBe(3);
        expect(policy.delayFor(1)).toBe(500);
        expect(policy.delayFor(2)).toBe(1000);
    });
});
