import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { serializeExpensesCsv } from '@pocket-ledger/core';
import type { DateRange } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { getExportPath } from '../workspace/paths.js';
import { resolveRange } from '../utils/range.js';
import { success, arrow, fail, errorMessage } from '../utils/console.js';
import type { OutputOptions, Workspace } from '../types.js';

/**
 * Writes the expenses in range to CSV (default: exports/expenses_<start>_<end>.csv).
 */
export async function exportExpenses(options: OutputOptions): Promise<void> {
    let path: string;
    let count: number;
    try {
        const workspace = openWorkspace(options);
        const range = resolveRange(options, workspace);
        path = outputPath(workspace, options, range, 'expenses', 'csv');

        const store = openLedger(workspace);
        let csv: string;
        try {
            const expenses = store.getExpenses(range);
            count = expenses.length;
            csv = serializeExpensesCsv(expenses);
        } finally {
            store.close();
        }

        mkdirSync(dirname(path), { recursive: true });
        writeFileSync(path, csv, 'utf-8');
    } catch (err) {
        fail(errorMessage(err));
    }

    success(`Exported ${count} expenses`);
    arrow(`File: ${path}`);
}

/**
 * --out relative to the current directory, else a dated file under the exports directory.
 */
export function outputPath(
    workspace: Workspace,
    options: OutputOptions,
    range: DateRange,
    prefix: string,
    extension: string
): string {
    if (options.out) return resolve(options.out);
    const span = [range.start ?? 'start', range.end ?? 'end'].join('_');
    return getExportPath(workspace, `${prefix}_${span}.${extension}`);
}
