import type { Expense } from '../../src/types/index.js';

let nextId = 1;

// Helper to create minimal expense
export function makeExpense(overrides: Partial<Expense> = {}): Expense {
    return {
        id: nextId++,
        date: '2026-01-15',
        amount: '10.00',
        description: 'Test expense',
        category: 'Food & Dining',
        payment_method: 'Cash',
        created_at: '2026-01-15T12:00:00.000Z',
        ...overrides,
    };
}
