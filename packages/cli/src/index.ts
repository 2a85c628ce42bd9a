#!/usr/bin/env node
/**
 * Pocket Ledger CLI
 *
 * The CLI owns all I/O: workspace files, the SQLite ledger, the model
 * file and console output. Core stays headless and returns warnings as data.
 */

import { parseCommand, USAGE } from './args.js';
import type { Command } from './args.js';
import { initWorkspace } from './commands/init.js';
import { addExpense } from './commands/add-expense.js';
import { addIncome } from './commands/add-income.js';
import { setBudget } from './commands/set-budget.js';
import { listExpenses } from './commands/list.js';
import { showTotals } from './commands/totals.js';
import { showBudgets } from './commands/budget.js';
import { categorizeDescription } from './commands/categorize.js';
import { exportExpenses } from './commands/export.js';
import { writeReport } from './commands/report.js';
import { log, fail, errorMessage } from './utils/console.js';

async function dispatch(command: Command): Promise<void> {
    switch (command.name) {
        case 'help':
            log(USAGE);
            return;
        case 'init':
            return initWorkspace(command.options);
        case 'add-expense':
            return addExpense(command.options);
        case 'add-income':
            return addIncome(command.options);
        case 'set-budget':
            return setBudget(command.options);
        case 'list':
            return listExpenses(command.options);
        case 'totals':
            return showTotals(command.options);
        case 'budget':
            return showBudgets(command.options);
        case 'categorize':
            return categorizeDescription(command.description, command.options);
        case 'export':
            return exportExpenses(command.options);
        case 'report':
            return writeReport(command.options);
    }
}

async function main() {
    let command: Command;
    try {
        command = parseCommand(process.argv.slice(2));
    } catch (err) {
        log(USAGE);
        fail(errorMessage(err));
    }
    await dispatch(command);
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
