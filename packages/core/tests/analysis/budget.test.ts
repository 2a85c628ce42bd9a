import { describe, it, expect } from 'vitest';
import { compareBudgets } from '../../src/analysis/budget.js';

describe('compareBudgets', () => {
    const budgets = [
        { id: 1, category: 'Food & Dining', amount: '300', month_year: '2026-01' },
        { id: 2, category: 'Travel', amount: '200', month_year: '2026-01' },
        { id: 3, category: 'Shopping', amount: '0', month_year: '2026-01' },
    ];
    const totals = [
        { category: 'Travel', total: '250.50', count: 2 },
        { category: 'Food & Dining', total: '100', count: 5 },
        { category: 'Healthcare', total: '40', count: 1 },
    ];

    it('reports spending against each budget', () => {
        expect(compareBudgets(budgets, totals)).toEqual([
            {
                category: 'Food & Dining',
                month_year: '2026-01',
                budget: '300',
                spent: '100',
                remaining: '200',
                percent_used: 33.3,
                over_budget: false,
            },
            {
                category: 'Travel',
                month_year: '2026-01',
                budget: '200',
                spent: '250.5',
                remaining: '-50.5',
                percent_used: 125.3,
                over_budget: true,
            },
            {
                category: 'Shopping',
                month_year: '2026-01',
                budget: '0',
                spent: '0',
                remaining: '0',
                percent_used: null,
                over_budget: false,
            },
        ]);
    });

    it('ignores categories without a budget', () => {
        const statuses = compareBudgets(budgets, totals);
        expect(statuses.map((s) => s.category)).not.toContain('Healthcare');
    });
});
