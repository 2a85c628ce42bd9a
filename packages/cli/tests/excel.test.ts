import { describe, it, expect } from 'vitest';
import type { Expense, Income, BudgetStatus } from '@pocket-ledger/core';
import { generateAnalysisExcel } from '../src/excel/analysis.js';

describe('Excel Generation', () => {
    const expenses: Expense[] = [
        {
            id: 2,
            date: '2026-01-12',
            amount: '45.00',
            description: 'uber ride',
            category: 'Transportation',
            payment_method: 'Credit Card',
            created_at: '2026-01-12T09:00:00.000Z',
        },
        {
            id: 1,
            date: '2026-01-10',
            amount: '15.00',
            description: 'pizza delivery',
            category: 'Food & Dining',
            payment_method: 'Cash',
            created_at: '2026-01-10T19:00:00.000Z',
        },
    ];
    const income: Income[] = [
        { id: 1, date: '2026-01-01', amount: '100', source: 'Salary', created_at: '2026-01-01T08:00:00.000Z' },
    ];
    const budgets: BudgetStatus[] = [
        {
            category: 'Transportation',
            month_year: '2026-01',
            budget: '40',
            spent: '45',
            remaining: '-5',
            percent_used: 112.5,
            over_budget: true,
        },
    ];

    const workbook = generateAnalysisExcel({
        range: { start: '2026-01-01', end: '2026-01-31' },
        expenses,
        income,
        budgets,
        generatedAt: new Date('2026-02-01T00:00:00.000Z'),
    });

    it('creates the summary sheets in order', () => {
        expect(workbook.worksheets.map((ws) => ws.name)).toEqual([
            'Expenses',
            'By Category',
            'By Payment Method',
            'Daily',
            'Budgets',
            'Summary',
        ]);
        expect(workbook.creator).toBe('Pocket Ledger');
    });

    it('writes expenses as numeric amounts', () => {
        const sheet = workbook.getWorksheet('Expenses');
        expect(sheet?.rowCount).toBe(3);
        expect(sheet?.getRow(2).getCell('description').value).toBe('uber ride');
        expect(sheet?.getRow(2).getCell('amount').value).toBe(45);
    });

    it('summarizes categories largest first with their share', () => {
        const sheet = workbook.getWorksheet('By Category');
        expect(sheet?.getRow(2).getCell('category').value).toBe('Transportation');
        expect(sheet?.getRow(2).getCell('total').value).toBe(45);
        expect(sheet?.getRow(2).getCell('share').value).toBe(0.75);
        expect(sheet?.getRow(3).getCell('category').value).toBe('Food & Dining');
        expect(sheet?.getRow(3).getCell('count').value).toBe(1);
    });

    it('lists daily totals in date order', () => {
        const sheet = workbook.getWorksheet('Daily');
        expect(sheet?.getRow(2).getCell('date').value).toBe('2026-01-10');
        expect(sheet?.getRow(3).getCell('date').value).toBe('2026-01-12');
    });

    it('marks over-budget rows', () => {
        const row = workbook.getWorksheet('Budgets')?.getRow(2);
        expect(row?.getCell('over_budget').value).toBe('yes');
        expect(row?.getCell('remaining').value).toBe(-5);
        expect(row?.getCell('percent_used').value).toBe(112.5);
    });

    it('reports cashflow in the summary', () => {
        const sheet = workbook.getWorksheet('Summary');
        expect(sheet?.getCell('B2').value).toBe('2026-01-01 to 2026-01-31');
        expect(sheet?.getCell('B3').value).toBe(100);
        expect(sheet?.getCell('B4').value).toBe(60);
        expect(sheet?.getCell('B5').value).toBe(40);
        expect(sheet?.getCell('B6').value).toBe(2);
    });
});
