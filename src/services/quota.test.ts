import { afterEach, describe, expect, it, vi } from 'vitest';
import { CancelledError, QuotaExceededError } from '../lib/errors';
import { FakeProvider, profilesOf } from '../test/fakeProvider';
import { QuotaTracker, warningLevelFor } from './quota';
import type { UsageWarningLevel } from '../types';

function tracker(capacity: number, maxConcurrent = 5, now?: () => Date, minRequestIntervalMs = 0) {
    const meteostat = new FakeProvider('meteostat', {
        profile: { maxConcurrent, minRequestIntervalMs, quota: { capacity, windowDays: 30 } }
    });
    return new QuotaTracker(profilesOf(meteostat), { now });
}

/** A permit task that stays in flight until `finish` is called. */
function held() {
    let finish = () => {};
    let markStarted = () => {};
    const started = new Promise<void>(resolve => {
        markStarted = resolve;
    });
    const task = () => {
        markStarted();
        return new Promise<void>(resolve => {
            finish = () => resolve();
        });
    };
    return { task, started, finish: () => finish() };
}

describe('warningLevelFor', () => {
    it.each<[number, UsageWarningLevel]>([
        [0, 'normal'],
        [59, 'normal'],
        [60, 'info'],
        [80, 'warning'],
        [95, 'critical'],
        [100, 'exhausted'],
        [120, 'exhausted']
    ])('maps %i of 100 calls to %s', (used, level) => {
        expect(warningLevelFor(used, 100)).toBe(level);
    });

    it('is always normal without a quota', () => {
        expect(warningLevelFor(1_000_000, null)).toBe('normal');
    });
});

describe('QuotaTracker', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('counts recorded calls against the window', async () => {
        const quota = tracker(10);

        await quota.withPermit('meteostat', undefined, async permit => {
            permit.recordUsage();
            permit.recordUsage();
        });

        expect(quota.remaining('meteostat')).toBe(9);
        expect(quota.stateOf('meteostat')).toMatchObject({ used: 1, remaining: 9, inFlight: 0, warningLevel: 'normal' });
    });

    it('counts pending reservations so concurrent callers cannot overshoot', async () => {
        const quota = tracker(2);
        const first = held();
        const second = held();
        const running = [quota.withPermit('meteostat', undefined, first.task), quota.withPermit('meteostat', undefined, second.task)];

        await expect(quota.withPermit('meteostat', undefined, async () => 'never')).rejects.toBeInstanceOf(QuotaExceededError);
        expect(quota.remaining('meteostat')).toBe(0);

        await Promise.all([first.started, second.started]);
        first.finish();
        second.finish();
        await Promise.all(running);
    });

    it('returns an unused reservation when the task settles', async () => {
        const quota = tracker(1);

        await expect(quota.withPermit('meteostat', undefined, async () => 'no call')).resolves.toBe('no call');

        expect(quota.remaining('meteostat')).toBe(1);
    });

    it('returns the reservation when the task throws', async () => {
        const quota = tracker(1);

        await expect(
            quota.withPermit('meteostat', undefined, async () => {
                throw new Error('boom');
            })
        ).rejects.toThrow('boom');

        expect(quota.remaining('meteostat')).toBe(1);
        expect(quota.stateOf('meteostat').inFlight).toBe(0);
    });

    it('reports when the window resets', async () => {
        const start = new Date('2024-01-01T00:00:00Z');
        const quota = tracker(1, 5, () => start);
        quota.recordUsage('meteostat');

        const error = await quota.withPermit('meteostat', undefined, async () => undefined).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(QuotaExceededError);
        expect(error instanceof QuotaExceededError && error.resetsAt.toISOString()).toBe('2024-01-31T00:00:00.000Z');
    });

    it('opens a fresh window once the old one has elapsed', () => {
        let now = new Date('2024-01-01T00:00:00Z');
        const quota = tracker(100, 5, () => now);
        quota.recordUsage('meteostat', 70);

        expect(quota.stateOf('meteostat')).toMatchObject({
            used: 70,
            warningLevel: 'info',
            windowStartedAt: '2024-01-01T00:00:00.000Z',
            windowResetsAt: '2024-01-31T00:00:00.000Z'
        });

        now = new Date('2024-01-31T00:00:00Z');

        expect(quota.stateOf('meteostat')).toMatchObject({ used: 0, remaining: 100, windowStartedAt: null });
    });

    it('hands slots to waiters in arrival order', async () => {
        const quota = tracker(100, 1);
        const order: string[] = [];
        const first = held();

        const running = [
            quota.withPermit('meteostat', undefined, first.task),
            quota.withPermit('meteostat', undefined, async () => {
                order.push('second');
            }),
            quota.withPermit('meteostat', undefined, async () => {
                order.push('third');
            })
        ];
        await first.started;

        expect(quota.stateOf('meteostat').inFlight).toBe(1);
        expect(order).toEqual([]);
        first.finish();
        await Promise.all(running);

        expect(order).toEqual(['second', 'third']);
        expect(quota.stateOf('meteostat').inFlight).toBe(0);
    });

    it('cancels a queued task that was aborted while waiting', async () => {
        const quota = tracker(3, 1);
        const first = held();
        const holding = quota.withPermit('meteostat', undefined, first.task);
        await first.started;
        const controller = new AbortController();
        const task = vi.fn(async () => undefined);

        const waiting = quota.withPermit('meteostat', controller.signal, task);
        expect(quota.remaining('meteostat')).toBe(1);
        controller.abort();
        first.finish();

        await expect(waiting).rejects.toBeInstanceOf(CancelledError);
        await holding;
        expect(task).not.toHaveBeenCalled();
        expect(quota.remaining('meteostat')).toBe(3);
        expect(quota.stateOf('meteostat').inFlight).toBe(0);
    });

    it('checks the budget again once a queued task gets its slot', async () => {
        const quota = tracker(2, 1);
        const first = held();
        const holding = quota.withPermit('meteostat', undefined, first.task);
        await first.started;
        const task = vi.fn(async () => undefined);

        const waiting = quota.withPermit('meteostat', undefined, task);
        quota.seedUsage('meteostat', 2);
        first.finish();

        await expect(waiting).rejects.toBeInstanceOf(QuotaExceededError);
        await holding;
        expect(task).not.toHaveBeenCalled();
    });

    it('spaces successive calls by the minimum request interval', async () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
        const quota = tracker(100, 5, undefined, 50);
        const startedAt: number[] = [];
        const record = async () => {
            startedAt.push(Date.now());
        };

        const running = [1, 2, 3].map(() => quota.withPermit('meteostat', undefined, record));
        await vi.advanceTimersByTimeAsync(200);
        await Promise.all(running);

        const origin = new Date('2024-01-01T00:00:00Z').getTime();
        expect(startedAt.map(time => time - origin)).toEqual([0, 50, 100]);
    });

    it('tracks unmetered providers without a budget', async () => {
        const quota = new QuotaTracker(profilesOf());

        await quota.withPermit('open-meteo', undefined, async permit => permit.recordUsage());

        expect(quota.remaining('open-meteo')).toBeNull();
        expect(quota.snapshot().map(state => [state.providerId, state.used, state.capacity])).toEqual([
            ['open-meteo', 1, null],
            ['meteostat', 0, 10_000]
        ]);
    });

    it('restores usage seeded from a previous run', () => {
        const quota = tracker(10_000);
        quota.seedUsage('meteostat', 9_600);

        expect(quota.stateOf('meteostat')).toMatchObject({ used: 9_600, remaining: 400, warningLevel: 'critical' });
    });
});
