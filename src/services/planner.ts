import { addDaysIso, daysInRange, isIsoDate } from '../lib/dateUtils';
import { InvalidRangeError, NoProviderAvailableError } from '../lib/errors';
import type { DateRange, FetchRequest, ProviderId, ProviderProfile, Segment } from '../types';

export const DEFAULT_MAX_RANGE_YEARS = 75;

export interface PlanOptions {
    /** Absolute ceiling on the request span, independent of any provider. */
    maxRangeYears?: number;
}

export function assertValidRange(range: DateRange, maxRangeYears = DEFAULT_MAX_RANGE_YEARS): number {
    if (!isIsoDate(range.start) || !isIsoDate(range.end)) {
        throw new InvalidRangeError(`Dates must be YYYY-MM-DD calendar dates (got ${range.start} .. ${range.end})`);
    }
    if (range.start > range.end) {
        throw new InvalidRangeError(`Start date ${range.start} is after end date ${range.end}`);
    }
    const days = daysInRange(range);
    const ceiling = maxRangeYears * 366;
    if (days > ceiling) {
        throw new InvalidRangeError(`Range of ${days} days exceeds the ${maxRangeYears}-year limit`);
    }
    return days;
}

/**
 * Greedy split into consecutive spans of at most `maxSpanDays`; only the last
 * span can be shorter.
 */
export function splitRange(range: DateRange, maxSpanDays: number): DateRange[] {
    if (!Number.isInteger(maxSpanDays) || maxSpanDays < 1) {
        throw new RangeError(`maxSpanDays must be a positive integer, got ${maxSpanDays}`);
    }
    const spans: DateRange[] = [];
    let start = range.start;
    let remaining = daysInRange(range);

    while (remaining > 0) {
        const length = Math.min(maxSpanDays, remaining);
        const end = addDaysIso(start, length - 1);
        spans.push({ start, end });
        start = addDaysIso(end, 1);
        remaining -= length;
    }
    return spans;
}

export function planSegments(
    request: Pick<FetchRequest, 'range'>,
    providerOrder: readonly ProviderId[],
    profiles: Readonly<Record<ProviderId, ProviderProfile>>,
    options: PlanOptions = {}
): Segment[] {
    assertValidRange(request.range, options.maxRangeYears);

    const [first] = providerOrder;
    if (!first) {
        throw new NoProviderAvailableError();
    }

    return splitRange(request.range, profiles[first].maxSpanDays).map((range, index) => ({
        index,
        range,
        providerOrder
    }));
}
