import { formatMoney, sumAmounts } from '@pocket-ledger/core';
import type { Expense } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { resolveRange, describeRange } from '../utils/range.js';
import { log, arrow, fail, errorMessage, formatTable } from '../utils/console.js';
import type { RangeOptions } from '../types.js';

export async function listExpenses(options: RangeOptions): Promise<void> {
    let expenses: Expense[];
    let label: string;
    try {
        const workspace = openWorkspace(options);
        const range = resolveRange(options, workspace);
        label = describeRange(range);

        const store = openLedger(workspace);
        try {
            expenses = store.getExpenses(range);
        } finally {
            store.close();
        }
    } catch (err) {
        fail(errorMessage(err));
    }

    log(`\nExpenses, ${label}`);
    if (expenses.length === 0) {
        arrow('No expenses recorded in this range.');
        return;
    }

    const rows = expenses.map((e) => [
        e.date,
        formatMoney(e.amount),
        e.category,
        e.payment_method,
        e.description,
    ]);
    for (const line of formatTable(['Date', 'Amount', 'Category', 'Payment', 'Description'], rows, new Set([1]))) {
        log(line);
    }
    log('');
    arrow(`${expenses.length} expenses, total ${formatMoney(sumAmounts(expenses.map((e) => e.amount)))}`);
}
