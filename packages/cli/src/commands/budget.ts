import { compareBudgets, formatMoney, monthRange, parseMonth, ValidationError } from '@pocket-ledger/core';
import type { BudgetStatus } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { currentMonth } from '../utils/range.js';
import { log, arrow, warn, fail, errorMessage, formatTable } from '../utils/console.js';
import type { BudgetReportOptions } from '../types.js';

/**
 * Budget vs. actual spending for one month (default: the current month).
 */
export async function showBudgets(options: BudgetReportOptions): Promise<void> {
    const month = options.month ?? currentMonth();
    let statuses: BudgetStatus[];
    try {
        if (!parseMonth(month)) {
            throw new ValidationError([`Month "${month}" must be YYYY-MM`]);
        }

        const workspace = openWorkspace(options);
        const store = openLedger(workspace);
        try {
            statuses = compareBudgets(store.getBudgets(), store.getCategoryTotals(monthRange(month)));
        } finally {
            store.close();
        }
    } catch (err) {
        fail(errorMessage(err));
    }

    log(`\nBudgets, ${month}`);
    if (statuses.length === 0) {
        arrow('No budgets set. Use set-budget to add one.');
        return;
    }

    const rows = statuses.map((s) => [
        s.category,
        formatMoney(s.budget),
        formatMoney(s.spent),
        formatMoney(s.remaining),
        s.percent_used === null ? '-' : `${s.percent_used.toFixed(1)}%`,
    ]);
    for (const line of formatTable(['Category', 'Budget', 'Spent', 'Remaining', 'Used'], rows, new Set([1, 2, 3, 4]))) {
        log(line);
    }

    for (const s of statuses.filter((s) => s.over_budget)) {
        warn(`${s.category} is over budget by ${formatMoney(s.remaining.replace(/^-/, ''))}`);
    }
}
