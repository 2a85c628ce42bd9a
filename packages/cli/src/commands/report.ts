import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Workbook } from 'exceljs';
import { compareBudgets, monthRange } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { generateAnalysisExcel } from '../excel/analysis.js';
import { resolveRange, currentMonth } from '../utils/range.js';
import { success, arrow, fail, errorMessage } from '../utils/console.js';
import { outputPath } from './export.js';
import type { OutputOptions } from '../types.js';

/**
 * Writes the analysis workbook for the range. Budgets are compared
 * against the month containing the range end (or the current month).
 */
export async function writeReport(options: OutputOptions): Promise<void> {
    let path: string;
    try {
        const workspace = openWorkspace(options);
        const range = resolveRange(options, workspace);
        path = outputPath(workspace, options, range, 'report', 'xlsx');
        const budgetMonth = range.end ? range.end.slice(0, 7) : currentMonth();

        const store = openLedger(workspace);
        let workbook: Workbook;
        try {
            workbook = generateAnalysisExcel({
                range,
                expenses: store.getExpenses(range),
                income: store.getIncome(range),
                budgets: compareBudgets(store.getBudgets(), store.getCategoryTotals(monthRange(budgetMonth))),
            });
        } finally {
            store.close();
        }

        mkdirSync(dirname(path), { recursive: true });
        await workbook.xlsx.writeFile(path);
    } catch (err) {
        fail(errorMessage(err));
    }

    success('Report written');
    arrow(`File: ${path}`);
}
