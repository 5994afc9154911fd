import { daysInRange, eachIsoDate, isWithinRange } from '../lib/dateUtils';
import { MergeInvariantError } from '../lib/errors';
import type { DailyRecord, DateRange, GapRange, GapReason, MergedSeries, SegmentOutcome } from '../types';

function reasonFor(outcome: SegmentOutcome): GapReason {
    switch (outcome.status) {
        case 'success':
            return 'no_data';
        case 'cancelled':
            return 'cancelled';
        case 'failed': {
            if (outcome.error === 'internal') return 'internal_error';
            const quotaOnly = outcome.attempts.every(attempt => attempt.outcome === 'quota_exhausted')
                && (outcome.attempts.length > 0 || outcome.error === 'quota_exhausted');
            return quotaOnly ? 'quota_exhausted' : 'all_providers_failed';
        }
    }
}

/** Groups sorted missing dates into runs of consecutive days sharing a reason. */
function groupGaps(missing: readonly { date: string; reason: GapReason }[]): GapRange[] {
    const gaps: GapRange[] = [];
    let previous: string | null = null;
    for (const { date, reason } of missing) {
        const current = gaps[gaps.length - 1];
        if (current && previous !== null && current.reason === reason && daysInRange({ start: previous, end: date }) === 2) {
            current.end = date;
            current.days += 1;
        } else {
            gaps.push({ start: date, end: date, days: 1, reason });
        }
        previous = date;
    }
    return gaps;
}

/**
 * Folds segment outcomes into one ordered daily series. Records outside
 * `range` are dropped and the first record seen for a date wins; every
 * other day of the range lands in `missingDates` with the reason of the
 * outcome that covered it. Pure: the same input gives an equal result.
 */
export function mergeOutcomes(outcomes: readonly SegmentOutcome[], range: DateRange): MergedSeries {
    const byDate = new Map<string, DailyRecord>();
    const reasons = new Map<string, GapReason>();

    for (const outcome of outcomes) {
        if (outcome.status === 'success') {
            for (const record of outcome.records) {
                if (isWithinRange(record.date, range) && !byDate.has(record.date)) {
                    byDate.set(record.date, record);
                }
            }
        }
        const reason = reasonFor(outcome);
        for (const date of eachIsoDate(outcome.segment.range)) {
            if (!reasons.has(date)) reasons.set(date, reason);
        }
    }

    const records: DailyRecord[] = [];
    const missing: { date: string; reason: GapReason }[] = [];
    for (const date of eachIsoDate(range)) {
        const record = byDate.get(date);
        if (record) {
            records.push(record);
        } else {
            // A day no outcome covered was never attempted.
            missing.push({ date, reason: reasons.get(date) ?? 'cancelled' });
        }
    }

    const totalDays = daysInRange(range);
    const missingDates = missing.map(entry => entry.date);
    if (records.length + missingDates.length !== totalDays || new Set([...byDate.keys(), ...missingDates]).size !== totalDays) {
        throw new MergeInvariantError(
            `Merged ${records.length} records and ${missingDates.length} missing dates for a ${totalDays}-day range`
        );
    }

    return {
        range: { ...range },
        records,
        missingDates,
        gaps: groupGaps(missing),
        coverage: records.length / totalDays
    };
}
