import { WEATHER_PARAMETERS } from '../types';
import type { GapRange, MergedSeries, WeatherParameter } from '../types';

export interface CsvOptions {
    /** Prefix a UTF-8 byte order mark for Excel. */
    bom?: boolean;
}

const BOM = '\uFEFF';

export function escapeCsvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

const toLine = (fields: string[]) => fields.map(escapeCsvField).join(',');

const finish = (lines: string[], options: CsvOptions) => (options.bom ? BOM : '') + lines.join('\n');

/**
 * One row per day with a record: date, source, then the parameters in the
 * given order. Missing values are empty cells. Parameters default to every
 * key present in the series.
 */
export function seriesToCsv(
    series: MergedSeries,
    parameters?: readonly WeatherParameter[],
    options: CsvOptions = {}
): string {
    const columns = parameters ?? collectParameters(series);
    const rows = series.records.map(record =>
        toLine([
            record.date,
            record.source,
            ...columns.map(parameter => {
                const value = record.values[parameter];
                return value === null || value === undefined ? '' : String(value);
            })
        ])
    );
    return finish([toLine(['date', 'source', ...columns]), ...rows], options);
}

export function gapsToCsv(gaps: readonly GapRange[], options: CsvOptions = {}): string {
    const rows = gaps.map(gap => toLine([gap.start, gap.end, String(gap.days), gap.reason]));
    return finish([toLine(['start', 'end', 'days', 'reason']), ...rows], options);
}

/** e.g. `Lake_Tahoe_2020-01-01_2020-12-31.csv` */
export function exportFileName(label: string, series: Pick<MergedSeries, 'range'>, suffix = ''): string {
    const safeName = (label.trim() || 'weather').replace(/[^a-z0-9]/gi, '_').replace(/_+/g, '_');
    return `${safeName}_${series.range.start}_${series.range.end}${suffix}.csv`;
}

function collectParameters(series: MergedSeries): WeatherParameter[] {
    return WEATHER_PARAMETERS.filter(parameter =>
        series.records.some(record => record.values[parameter] !== undefined)
    );
}
