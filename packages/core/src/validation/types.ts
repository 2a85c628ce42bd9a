/**
 * Internal types for validation module.
 */

import type { Category } from '../types/index.js';

/**
 * Outcome of checking a typed amount.
 */
export type AmountCheck =
    | { ok: true; amount: string }
    | { ok: false; issue: string };

/**
 * A category picked at the input boundary: one of the standard set,
 * or an explicit custom label.
 */
export type CategoryChoice =
    | { kind: 'standard'; category: Category }
    | { kind: 'custom'; label: string };

export interface CategoryOptions {
    allowCustom?: boolean;
}

/**
 * Raw form fields as typed. Everything optional; validators report what's missing.
 */
export interface ExpenseFields {
    date?: string;
    amount?: string;
    description?: string;
    category?: string;
    paymentMethod?: string;
}

export interface IncomeFields {
    date?: string;
    amount?: string;
    source?: string;
}

export interface BudgetFields {
    category?: string;
    amount?: string;
    monthYear?: string;
}
