import { addDays } from 'date-fns';
import pLimit, { type LimitFunction } from 'p-limit';
import { sleep, throwIfAborted } from '../lib/async';
import { QuotaExceededError } from '../lib/errors';
import { PROVIDER_IDS } from '../types';
import type { ProviderId, ProviderProfile, QuotaState, UsageWarningLevel } from '../types';

export const USAGE_THRESHOLDS = { info: 0.6, warning: 0.8, critical: 0.95 } as const;

export interface QuotaPermit {
    readonly providerId: ProviderId;
    /** Counts the physical call made under this permit. Only the first call counts. */
    recordUsage(): void;
}

interface UsageCounters {
    used: number;
    /** Reservations granted or queued that have not recorded a call yet. */
    pending: number;
    windowStartedAt: Date | null;
    /** Earliest time the next call may start, in epoch milliseconds. */
    nextCallAt: number;
}

export function warningLevelFor(used: number, capacity: number | null): UsageWarningLevel {
    if (capacity === null) return 'normal';
    if (used >= capacity) return 'exhausted';
    const ratio = capacity === 0 ? 1 : used / capacity;
    if (ratio >= USAGE_THRESHOLDS.critical) return 'critical';
    if (ratio >= USAGE_THRESHOLDS.warning) return 'warning';
    if (ratio >= USAGE_THRESHOLDS.info) return 'info';
    return 'normal';
}

/**
 * Process-wide owner of per-provider usage: a concurrency cap enforced with
 * one p-limit queue per provider, a minimum spacing between calls and an
 * optional call budget per fixed window. The window opens on the first
 * recorded call and resets once `windowDays` have passed.
 *
 * Every read or write of the counters goes through `mutate`, which runs to
 * completion without awaiting, so concurrent segments observe a single
 * linear history of reservations and usage.
 */
export class QuotaTracker {
    private readonly counters = new Map<ProviderId, UsageCounters>();
    private readonly limits = new Map<ProviderId, LimitFunction>();
    private readonly now: () => Date;

    constructor(
        private readonly profiles: Readonly<Record<ProviderId, ProviderProfile>>,
        options: { now?: () => Date } = {}
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Runs `task` under a permit once a concurrency slot is free and the
     * provider's request spacing has elapsed. Fails fast with
     * QuotaExceededError when the window budget is spent, counting
     * reservations still queued, and checks the budget again once the slot
     * is granted. The slot is freed when `task` settles.
     */
    async withPermit<T>(providerId: ProviderId, signal: AbortSignal | undefined, task: (permit: QuotaPermit) => Promise<T>): Promise<T> {
        throwIfAborted(signal);
        this.mutate(providerId, (counters, capacity) => {
            if (capacity !== null && counters.used + counters.pending >= capacity) {
                throw new QuotaExceededError(providerId, this.resetsAt(providerId, counters));
            }
            counters.pending += 1;
        });

        let recorded = false;
        let settled = false;
        const permit: QuotaPermit = {
            providerId,
            recordUsage: () => {
                if (recorded || settled) return;
                recorded = true;
                this.mutate(providerId, counters => {
                    counters.pending -= 1;
                    this.count(counters, 1);
                });
            }
        };

        return this.limitFor(providerId)(async () => {
            try {
                throwIfAborted(signal);
                await this.pace(providerId, signal);
                this.mutate(providerId, (counters, capacity) => {
                    if (capacity !== null && counters.used + counters.pending > capacity) {
                        throw new QuotaExceededError(providerId, this.resetsAt(providerId, counters));
                    }
                });
                return await task(permit);
            } finally {
                settled = true;
                if (!recorded) {
                    this.mutate(providerId, counters => {
                        counters.pending -= 1;
                    });
                }
            }
        });
    }

    /** Counts a call made outside a permit. */
    recordUsage(providerId: ProviderId, calls = 1): void {
        this.mutate(providerId, counters => this.count(counters, calls));
    }

    /** Restores usage counted elsewhere, e.g. a persisted monthly counter. */
    seedUsage(providerId: ProviderId, used: number): void {
        this.mutate(providerId, counters => {
            counters.used = used;
            if (used > 0 && !counters.windowStartedAt) {
                counters.windowStartedAt = this.now();
            }
        });
    }

    /** Calls left in the current window, or null when the provider is unmetered. */
    remaining(providerId: ProviderId): number | null {
        return this.mutate(providerId, (counters, capacity) =>
            capacity === null ? null : Math.max(0, capacity - counters.used - counters.pending)
        );
    }

    snapshot(): QuotaState[] {
        return PROVIDER_IDS.map(id => this.stateOf(id));
    }

    stateOf(providerId: ProviderId): QuotaState {
        return this.mutate(providerId, (counters, capacity) => {
            const windowStartedAt = capacity === null ? null : counters.windowStartedAt;
            const windowResetsAt = windowStartedAt
                ? this.resetsAt(providerId, counters).toISOString()
                : null;
            return {
                providerId,
                used: counters.used,
                capacity,
                remaining: capacity === null ? null : Math.max(0, capacity - counters.used - counters.pending),
                inFlight: this.limitFor(providerId).activeCount,
                windowStartedAt: windowStartedAt?.toISOString() ?? null,
                windowResetsAt,
                warningLevel: warningLevelFor(counters.used, capacity)
            };
        });
    }

    private mutate<T>(providerId: ProviderId, fn: (counters: UsageCounters, capacity: number | null) => T): T {
        const quota = this.profiles[providerId].quota;
        let counters = this.counters.get(providerId);
        if (!counters) {
            counters = { used: 0, pending: 0, windowStartedAt: null, nextCallAt: 0 };
            this.counters.set(providerId, counters);
        }
        if (quota && counters.windowStartedAt && this.now() >= addDays(counters.windowStartedAt, quota.windowDays)) {
            counters.used = 0;
            counters.windowStartedAt = null;
        }
        return fn(counters, quota ? quota.capacity : null);
    }

    private count(counters: UsageCounters, calls: number): void {
        counters.used += calls;
        if (!counters.windowStartedAt) {
            counters.windowStartedAt = this.now();
        }
    }

    private resetsAt(providerId: ProviderId, counters: UsageCounters): Date {
        const windowDays = this.profiles[providerId].quota?.windowDays ?? 0;
        return addDays(counters.windowStartedAt ?? this.now(), windowDays);
    }

    /** Claims the next call slot in time and waits until it arrives. */
    private async pace(providerId: ProviderId, signal: AbortSignal | undefined): Promise<void> {
        const interval = this.profiles[providerId].minRequestIntervalMs;
        if (interval <= 0) return;
        const delay = this.mutate(providerId, counters => {
            const now = Date.now();
            const startAt = Math.max(now, counters.nextCallAt);
            counters.nextCallAt = startAt + interval;
            return startAt - now;
        });
        if (delay > 0) await sleep(delay, signal);
    }

    private limitFor(providerId: ProviderId): LimitFunction {
        let limit = this.limits.get(providerId);
        if (!limit) {
            limit = pLimit(this.profiles[providerId].maxConcurrent);
            this.limits.set(providerId, limit);
        }
        return limit;
    }
}
