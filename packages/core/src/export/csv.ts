/**
 * Expense CSV export and re-import.
 *
 * Format:
 * - Header row: id,date,amount,description,category,payment_method,created_at
 * - One expense per line, standard CSV quoting
 * - Values written exactly as stored (amounts are not reformatted)
 */

import * as XLSX from 'xlsx';
import { EXPENSE_CSV_COLUMNS, ExpenseSchema } from '../types/index.js';
import type { Expense, ExpenseParseResult } from '../types/index.js';

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Serialize expenses to CSV text, rows in the order given.
 */
export function serializeExpensesCsv(expenses: readonly Expense[]): string {
    const rows = expenses.map((e) => ({
        id: e.id,
        date: e.date,
        amount: e.amount,
        description: e.description,
        category: e.category,
        payment_method: e.payment_method,
        created_at: e.created_at,
    }));
    const sheet = XLSX.utils.json_to_sheet(rows, { header: [...EXPENSE_CSV_COLUMNS] });
    return XLSX.utils.sheet_to_csv(sheet);
}

/**
 * Parse CSV text produced by serializeExpensesCsv.
 *
 * Cells are read as plain text so dates and amounts survive unchanged.
 * Rows that fail schema validation are skipped and counted.
 *
 * @throws Error if a required column is missing from the header
 */
export function parseExpensesCsv(text: string): ExpenseParseResult {
    const workbook = XLSX.read(stripBom(text), { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }).map(row => {
        const clean: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(row)) {
            clean[stripBom(k).trim()] = v;
        }
        return clean;
    });

    const warnings: string[] = [];
    const expenses: Expense[] = [];

    if (rows.length === 0) {
        return { expenses, warnings, skippedRows: 0 };
    }

    const firstRow = rows[0];
    const missingColumns = EXPENSE_CSV_COLUMNS.filter((col) => !(col in firstRow));
    if (missingColumns.length > 0) {
        throw new Error(
            `Expense CSV: Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${Object.keys(firstRow).join(', ')}`
        );
    }

    let skipped = 0;
    rows.forEach((row, i) => {
        const candidate = {
            id: parseInt(String(row['id']), 10),
            date: String(row['date']),
            amount: String(row['amount']),
            description: String(row['description']),
            category: String(row['category']),
            payment_method: String(row['payment_method']),
            created_at: String(row['created_at']),
        };

        const parsed = ExpenseSchema.safeParse(candidate);
        if (parsed.success) {
            expenses.push(parsed.data);
        } else {
            const issue = parsed.error.issues[0];
            // +2: header is line 1
            warnings.push(`Line ${i + 2}: ${issue.path.join('.')} ${issue.message}`);
            skipped++;
        }
    });

    if (skipped) {
        warnings.push(`Skipped ${skipped} rows that failed schema validation`);
    }

    return { expenses, warnings, skippedRows: skipped };
}
