import { validateExpenseInput, formatMoney } from '@pocket-ledger/core';
import type { Expense } from '@pocket-ledger/core';
import { openWorkspace, openLedger, createCategorizer } from '../workspace/context.js';
import { today } from '../utils/range.js';
import { success, warn, arrow, fail, errorMessage } from '../utils/console.js';
import type { AddExpenseOptions, Workspace } from '../types.js';

export async function addExpense(options: AddExpenseOptions): Promise<void> {
    let expense: Expense;
    try {
        const workspace = openWorkspace(options);
        const category = options.category ?? suggestCategory(workspace, options.description);

        const input = validateExpenseInput(
            {
                date: options.date ?? today(),
                amount: options.amount,
                description: options.description,
                category,
                paymentMethod: options.payment,
            },
            { allowCustom: options.custom }
        );

        const store = openLedger(workspace);
        try {
            expense = store.addExpense(input);
        } finally {
            store.close();
        }
    } catch (err) {
        fail(errorMessage(err));
    }

    success(`Expense #${expense.id} recorded`);
    arrow(`Date:        ${expense.date}`);
    arrow(`Amount:      ${formatMoney(expense.amount)}`);
    arrow(`Description: ${expense.description}`);
    arrow(`Category:    ${expense.category}`);
    arrow(`Payment:     ${expense.payment_method}`);
}

/**
 * Asks the categorizer when no category was given. Returns undefined for a
 * blank description so validation reports the missing fields.
 */
function suggestCategory(workspace: Workspace, description: string | undefined): string | undefined {
    if (description === undefined || description.trim() === '') return undefined;

    const { result, warnings } = createCategorizer(workspace).classify(description);
    for (const w of warnings) {
        warn(w);
    }
    const confidence = `${(result.confidence * 100).toFixed(1)}%`;
    if (result.fallback) {
        arrow(`No confident match, using ${result.category} (best guess ${result.predicted ?? 'none'} at ${confidence})`);
    } else {
        arrow(`Suggested category: ${result.category} (${confidence})`);
    }
    return result.category;
}
