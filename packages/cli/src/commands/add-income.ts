import { validateIncomeInput, formatMoney } from '@pocket-ledger/core';
import type { Income } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { today } from '../utils/range.js';
import { success, arrow, fail, errorMessage } from '../utils/console.js';
import type { AddIncomeOptions } from '../types.js';

export async function addIncome(options: AddIncomeOptions): Promise<void> {
    let income: Income;
    try {
        const workspace = openWorkspace(options);
        const input = validateIncomeInput({
            date: options.date ?? today(),
            amount: options.amount,
            source: options.source,
        });

        const store = openLedger(workspace);
        try {
            income = store.addIncome(input);
        } finally {
            store.close();
        }
    } catch (err) {
        fail(errorMessage(err));
    }

    success(`Income #${income.id} recorded`);
    arrow(`Date:   ${income.date}`);
    arrow(`Amount: ${formatMoney(income.amount)}`);
    arrow(`Source: ${income.source}`);
}
