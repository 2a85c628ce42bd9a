import { describe, it, expect } from 'vitest';
import {
    parseIsoDate,
    parseMonth,
    formatIsoDate,
    isValidDate,
    addDays,
    monthRange,
    trailingRange,
} from '../../src/utils/date-parse.js';

describe('date-parse utilities', () => {
    describe('parseIsoDate', () => {
        it('should parse valid YYYY-MM-DD', () => {
            const date = parseIsoDate('2026-01-15');
            expect(date).not.toBeNull();
            expect(date?.getUTCFullYear()).toBe(2026);
            expect(date?.getUTCMonth()).toBe(0);
            expect(date?.getUTCDate()).toBe(15);
        });

        it('should return null for invalid format', () => {
            expect(parseIsoDate('01/15/2026')).toBeNull();
            expect(parseIsoDate('2026-1-5')).toBeNull();
        });

        it('should return null for impossible dates', () => {
            expect(parseIsoDate('2026-02-30')).toBeNull();
            expect(parseIsoDate('2026-13-01')).toBeNull();
        });
    });

    describe('parseMonth', () => {
        it('should return the first of the month', () => {
            const first = parseMonth('2026-03');
            expect(first && formatIsoDate(first)).toBe('2026-03-01');
        });

        it('should reject month 00', () => {
            expect(parseMonth('2026-00')).toBeNull();
        });
    });

    describe('formatIsoDate', () => {
        it('should format date to YYYY-MM-DD', () => {
            const date = new Date(Date.UTC(2026, 0, 15));
            expect(formatIsoDate(date)).toBe('2026-01-15');
        });
    });

    describe('addDays', () => {
        it('should cross month boundaries', () => {
            expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
            expect(addDays('2026-01-31', 1)).toBe('2026-02-01');
        });

        it('should throw on invalid input', () => {
            expect(() => addDays('nope', 1)).toThrow(/Invalid date/);
        });
    });

    describe('monthRange', () => {
        it('should cover the whole month', () => {
            expect(monthRange('2026-02')).toEqual({ start: '2026-02-01', end: '2026-02-28' });
            expect(monthRange('2028-02')).toEqual({ start: '2028-02-01', end: '2028-02-29' });
            expect(monthRange('2026-12')).toEqual({ start: '2026-12-01', end: '2026-12-31' });
        });
    });

    describe('trailingRange', () => {
        it('should end today and start N days earlier', () => {
            const now = new Date(2026, 0, 15, 12, 0, 0);
            expect(trailingRange(30, now)).toEqual({ start: '2025-12-16', end: '2026-01-15' });
        });
    });

    describe('isValidDate', () => {
        it('should return true for valid date', () => {
            expect(isValidDate(new Date())).toBe(true);
        });

        it('should return false for invalid date', () => {
            expect(isValidDate(new Date('invalid'))).toBe(false);
        });
    });
});
