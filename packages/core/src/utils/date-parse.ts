/**
 * Calendar date utilities.
 * Ledger dates are plain YYYY-MM-DD strings; Date objects here are UTC midnight.
 */

import type { DateRange } from '../types/index.js';

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * Returns null for malformed strings and impossible dates (e.g. 2026-02-30).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    const year = parseInt(match[1]);
    const month = parseInt(match[2]);
    const day = parseInt(match[3]);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Parse YYYY-MM month string. Returns the first day of the month (UTC).
 */
export function parseMonth(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})$/);
    if (!match) return null;
    return parseIsoDate(`${match[1]}-${match[2]}-01`);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Format the local calendar date of a timestamp, for "today" defaults.
 */
export function formatLocalDate(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

export function addDays(isoDate: string, days: number): string {
    const date = parseIsoDate(isoDate);
    if (!date) {
        throw new Error(`Invalid date: ${isoDate}`);
    }
    date.setUTCDate(date.getUTCDate() + days);
    return formatIsoDate(date);
}

/**
 * Inclusive date range covering a whole YYYY-MM month.
 */
export function monthRange(month: string): Required<DateRange> {
    const first = parseMonth(month);
    if (!first) {
        throw new Error(`Invalid month: ${month}`);
    }
    const last = new Date(Date.UTC(first.getUTCFullYear(), first.getUTCMonth() + 1, 0));
    return { start: formatIsoDate(first), end: formatIsoDate(last) };
}

/**
 * The trailing window [today - days, today] in local time.
 */
export function trailingRange(days: number, now: Date = new Date()): Required<DateRange> {
    const end = formatLocalDate(now);
    return { start: addDays(end, -days), end };
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
