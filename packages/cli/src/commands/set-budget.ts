import { validateBudgetInput, formatMoney } from '@pocket-ledger/core';
import type { Budget } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { currentMonth } from '../utils/range.js';
import { success, arrow, fail, errorMessage } from '../utils/console.js';
import type { SetBudgetOptions } from '../types.js';

/**
 * One budget per category: setting it again replaces the amount and month.
 */
export async function setBudget(options: SetBudgetOptions): Promise<void> {
    let budget: Budget;
    try {
        const workspace = openWorkspace(options);
        const input = validateBudgetInput(
            {
                category: options.category,
                amount: options.amount,
                monthYear: options.month ?? currentMonth(),
            },
            { allowCustom: options.custom }
        );

        const store = openLedger(workspace);
        try {
            budget = store.setBudget(input);
        } finally {
            store.close();
        }
    } catch (err) {
        fail(errorMessage(err));
    }

    success(`Budget set for ${budget.category}`);
    arrow(`Amount: ${formatMoney(budget.amount)}`);
    arrow(`Month:  ${budget.month_year}`);
}
