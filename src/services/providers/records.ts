import type { DailyRecord, ProviderId, WeatherParameter } from '../../types';

export const numberOrNull = (value: unknown): number | null =>
    typeof value === 'number' && Number.isFinite(value) ? value : null;

/**
 * Builds a record with every requested parameter present. A day on which the
 * provider returned nothing but nulls is treated as not answered, so the
 * merger reports it as a gap instead of an empty row.
 */
export function toDailyRecord(
    date: string,
    parameters: readonly WeatherParameter[],
    source: ProviderId,
    read: (parameter: WeatherParameter) => number | null
): DailyRecord | null {
    const values: DailyRecord['values'] = {};
    let answered = false;
    for (const parameter of parameters) {
        const value = read(parameter);
        values[parameter] = value;
        if (value !== null) answered = true;
    }
    return answered ? { date, values, source } : null;
}
