/**
 * Budget tracking: compare monthly targets with actual category spending.
 */

import { Decimal } from 'decimal.js';
import { toAmountString } from '../utils/money.js';
import type { Budget, BudgetStatus, CategoryTotal } from '../types/index.js';

/**
 * One status row per budget, in budget order.
 *
 * `totals` should already be filtered to the month being tracked. A budget
 * with no matching spending reports spent = 0. `percent_used` is null for
 * a zero budget, rounded to one decimal place otherwise.
 */
export function compareBudgets(budgets: readonly Budget[], totals: readonly CategoryTotal[]): BudgetStatus[] {
    const spentByCategory = new Map(totals.map((t) => [t.category, new Decimal(t.total)]));

    return budgets.map((budget) => {
        const target = new Decimal(budget.amount);
        const spent = spentByCategory.get(budget.category) ?? new Decimal(0);
        const remaining = target.minus(spent);

        return {
            category: budget.category,
            month_year: budget.month_year,
            budget: toAmountString(target),
            spent: toAmountString(spent),
            remaining: toAmountString(remaining),
            percent_used: target.isZero()
                ? null
                : spent.dividedBy(target).times(100).toDecimalPlaces(1).toNumber(),
            over_budget: spent.greaterThan(target),
        };
    });
}
