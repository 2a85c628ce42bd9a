import { validateDateRange, trailingRange, formatLocalDate } from '@pocket-ledger/core';
import type { DateRange } from '@pocket-ledger/core';
import type { RangeOptions, Workspace } from '../types.js';

/**
 * --from/--to as given; with neither, the trailing default_range_days window.
 * Throws ValidationError on a malformed or inverted range.
 */
export function resolveRange(options: RangeOptions, workspace: Workspace, now: Date = new Date()): DateRange {
    if (options.from === undefined && options.to === undefined) {
        return trailingRange(workspace.settings.default_range_days, now);
    }
    return validateDateRange(options.from, options.to);
}

export function describeRange(range: DateRange): string {
    if (range.start && range.end) return `${range.start} to ${range.end}`;
    if (range.start) return `from ${range.start}`;
    if (range.end) return `through ${range.end}`;
    return 'all dates';
}

export function currentMonth(now: Date = new Date()): string {
    return formatLocalDate(now).slice(0, 7);
}

export function today(now: Date = new Date()): string {
    return formatLocalDate(now);
}
