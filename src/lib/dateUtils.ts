import { addDays, differenceInCalendarDays, eachDayOfInterval, format, isValid, parseISO, subDays } from 'date-fns';
import type { DateRange } from '../types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar dates are handled as local midnights throughout; only the
 * YYYY-MM-DD string ever crosses a module boundary, so no timezone shift
 * can leak into a record key.
 */
export function isIsoDate(value: string): boolean {
    if (!ISO_DATE.test(value)) return false;
    const parsed = parseISO(value);
    // Round trip so overflowing days such as 2023-02-30 never pass.
    return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value;
}

export function parseIsoDate(value: string): Date {
    if (!isIsoDate(value)) {
        throw new RangeError(`Not an ISO calendar date: ${value}`);
    }
    return parseISO(value);
}

export function toIsoDate(date: Date): string {
    return format(date, 'yyyy-MM-dd');
}

export function addDaysIso(value: string, days: number): string {
    return toIsoDate(addDays(parseIsoDate(value), days));
}

export function daysInRange(range: DateRange): number {
    return differenceInCalendarDays(parseIsoDate(range.end), parseIsoDate(range.start)) + 1;
}

export function eachIsoDate(range: DateRange): string[] {
    return eachDayOfInterval({ start: parseIsoDate(range.start), end: parseIsoDate(range.end) }).map(toIsoDate);
}

export function isWithinRange(date: string, range: DateRange): boolean {
    return date >= range.start && date <= range.end;
}

/**
 * Normalizes provider timestamps ("2024-01-01 00:00:00", "2024-01-01T00:00")
 * to the calendar date they start with. Returns null when there is none.
 */
export function toCalendarDate(value: string): string | null {
    const candidate = value.trim().slice(0, 10);
    return isIsoDate(candidate) ? candidate : null;
}

/** The last `daysBack` days up to and including `today`. */
export function rangeEndingToday(daysBack: number, today: Date = new Date()): DateRange {
    return {
        start: toIsoDate(subDays(today, daysBack)),
        end: toIsoDate(today)
    };
}
