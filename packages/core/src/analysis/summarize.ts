/**
 * Aggregations over ledger rows: category, payment method, daily and
 * cashflow totals. All sums are exact (Decimal).
 */

import { Decimal } from 'decimal.js';
import { sumAmounts, toAmountString } from '../utils/money.js';
import type {
    Expense,
    Income,
    CategoryTotal,
    PaymentMethodTotal,
    DailyTotal,
    CashflowSummary,
} from '../types/index.js';

interface Bucket {
    total: Decimal;
    count: number;
}

function groupTotals<T>(rows: readonly T[], keyOf: (row: T) => string, amountOf: (row: T) => string): Map<string, Bucket> {
    const buckets = new Map<string, Bucket>();
    for (const row of rows) {
        const key = keyOf(row);
        const bucket = buckets.get(key) ?? { total: new Decimal(0), count: 0 };
        bucket.total = bucket.total.plus(new Decimal(amountOf(row)));
        bucket.count++;
        buckets.set(key, bucket);
    }
    return buckets;
}

/**
 * Descending by total; equal totals by key ascending so output is deterministic.
 */
function byTotalDesc(a: [string, Bucket], b: [string, Bucket]): number {
    const cmp = b[1].total.comparedTo(a[1].total);
    if (cmp !== 0) return cmp;
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

/**
 * Total spending per category. Categories with no expenses don't appear.
 */
export function summarizeByCategory(expenses: readonly Expense[]): CategoryTotal[] {
    const buckets = groupTotals(expenses, (e) => e.category, (e) => e.amount);
    return [...buckets.entries()].sort(byTotalDesc).map(([category, b]) => ({
        category,
        total: toAmountString(b.total),
        count: b.count,
    }));
}

export function summarizeByPaymentMethod(expenses: readonly Expense[]): PaymentMethodTotal[] {
    const buckets = groupTotals(expenses, (e) => e.payment_method, (e) => e.amount);
    return [...buckets.entries()].sort(byTotalDesc).map(([payment_method, b]) => ({
        payment_method,
        total: toAmountString(b.total),
        count: b.count,
    }));
}

/**
 * Spending per calendar day, oldest first. Days without expenses are skipped.
 */
export function dailyTotals(expenses: readonly Expense[]): DailyTotal[] {
    const buckets = groupTotals(expenses, (e) => e.date, (e) => e.amount);
    return [...buckets.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([date, b]) => ({ date, total: toAmountString(b.total) }));
}

export function summarizeCashflow(expenses: readonly Expense[], income: readonly Income[]): CashflowSummary {
    const totalExpenses = sumAmounts(expenses.map((e) => e.amount));
    const totalIncome = sumAmounts(income.map((i) => i.amount));
    return {
        total_income: toAmountString(totalIncome),
        total_expenses: toAmountString(totalExpenses),
        net: toAmountString(totalIncome.minus(totalExpenses)),
        expense_count: expenses.length,
        income_count: income.length,
    };
}
