import { describe, it, expect } from 'vitest';
import { serializeExpensesCsv, parseExpensesCsv, stripBom } from '../../src/export/csv.js';
import { makeExpense } from '../fixtures/expenses.js';

describe('serializeExpensesCsv', () => {
    it('writes the header row first', () => {
        const csv = serializeExpensesCsv([makeExpense()]);
        expect(csv.split('\n')[0]).toBe('id,date,amount,description,category,payment_method,created_at');
    });

    it('writes one line per record with values as stored', () => {
        const csv = serializeExpensesCsv([
            makeExpense({
                id: 7,
                date: '2026-01-15',
                amount: '12.50',
                description: 'Coffee shop',
                category: 'Food & Dining',
                payment_method: 'Debit Card',
                created_at: '2026-01-15T08:00:00.000Z',
            }),
        ]);
        expect(csv.split('\n')[1]).toBe('7,2026-01-15,12.50,Coffee shop,Food & Dining,Debit Card,2026-01-15T08:00:00.000Z');
    });

    it('quotes fields containing commas and quotes', () => {
        const csv = serializeExpensesCsv([makeExpense({ id: 3, description: 'Books, "used"' })]);
        expect(csv.split('\n')[1]).toContain(',"Books, ""used""",');
    });
});

describe('parseExpensesCsv', () => {
    it('round-trips exported expenses', () => {
        const expenses = [
            makeExpense({ id: 12, date: '2026-01-20', amount: '45.00', description: 'Movie tickets, 2x', category: 'Entertainment', payment_method: 'Credit Card' }),
            makeExpense({ id: 11, date: '2026-01-18', amount: '-5.25', description: 'Refund "coupon"', category: 'Shopping' }),
            makeExpense({ id: 10, date: '2026-01-02', amount: '1200', description: 'Tuition', category: 'Education', payment_method: 'Bank Transfer' }),
        ];

        const result = parseExpensesCsv(serializeExpensesCsv(expenses));

        expect(result.expenses).toEqual(expenses);
        expect(result.warnings).toEqual([]);
        expect(result.skippedRows).toBe(0);
    });

    it('accepts a leading byte order mark', () => {
        const csv = '\uFEFF' + serializeExpensesCsv([makeExpense({ id: 1 })]);
        expect(parseExpensesCsv(csv).expenses).toHaveLength(1);
    });

    it('skips rows that fail validation', () => {
        const csv = [
            'id,date,amount,description,category,payment_method,created_at',
            '1,2026-01-15,9.99,Haircut,Personal Care,Cash,2026-01-15T10:00:00.000Z',
            '2,15/01/2026,9.99,Haircut,Personal Care,Cash,2026-01-15T10:00:00.000Z',
        ].join('\n');

        const result = parseExpensesCsv(csv);

        expect(result.expenses).toHaveLength(1);
        expect(result.skippedRows).toBe(1);
        expect(result.warnings).toEqual([
            'Line 3: date Must be YYYY-MM-DD format',
            'Skipped 1 rows that failed schema validation',
        ]);
    });

    it('throws on missing columns', () => {
        expect(() => parseExpensesCsv('id,date,amount\n1,2026-01-15,3')).toThrow(/Missing required columns: description/);
    });
});

describe('stripBom', () => {
    it('removes only a leading BOM', () => {
        expect(stripBom('\uFEFFid')).toBe('id');
        expect(stripBom('id')).toBe('id');
    });
});
