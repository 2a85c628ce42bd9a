import type { Workbook } from 'exceljs';
import {
    summarizeByCategory,
    summarizeByPaymentMethod,
    dailyTotals,
    summarizeCashflow,
} from '@pocket-ledger/core';
import type { Expense, Income, BudgetStatus, DateRange } from '@pocket-ledger/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyCell, amountCell } from './utils.js';

export interface AnalysisInput {
    range: DateRange;
    expenses: Expense[];
    income: Income[];
    budgets: BudgetStatus[];
    generatedAt?: Date;
}

/**
 * Builds the analysis workbook: the raw expenses plus one sheet per summary.
 */
export function generateAnalysisExcel(input: AnalysisInput): Workbook {
    const workbook = createWorkbook(input.generatedAt);

    addExpensesSheet(workbook, input.expenses);
    addCategorySheet(workbook, input.expenses);
    addPaymentMethodSheet(workbook, input.expenses);
    addDailySheet(workbook, input.expenses);
    addBudgetSheet(workbook, input.budgets);
    addSummarySheet(workbook, input);

    return workbook;
}

function addExpensesSheet(workbook: Workbook, expenses: Expense[]): void {
    const sheet = workbook.addWorksheet('Expenses');
    sheet.columns = [
        { header: 'id', key: 'id' },
        { header: 'date', key: 'date' },
        { header: 'amount', key: 'amount' },
        { header: 'description', key: 'description' },
        { header: 'category', key: 'category' },
        { header: 'payment_method', key: 'payment_method' },
    ];

    for (const e of expenses) {
        sheet.addRow({ ...e, amount: amountCell(e.amount) });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'amount');
    autoFitColumns(sheet);
}

/**
 * Sheet: By Category
 * Columns: category, total, count, share (fraction of all spending)
 */
function addCategorySheet(workbook: Workbook, expenses: Expense[]): void {
    const sheet = workbook.addWorksheet('By Category');
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'total', key: 'total' },
        { header: 'count', key: 'count' },
        { header: 'share', key: 'share' },
    ];

    const totals = summarizeByCategory(expenses);
    const grand = totals.reduce((sum, t) => sum + amountCell(t.total), 0);
    for (const t of totals) {
        sheet.addRow({
            category: t.category,
            total: amountCell(t.total),
            count: t.count,
            share: grand === 0 ? null : amountCell(t.total) / grand,
        });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'total');
    sheet.getColumn('share').numFmt = '0.0%';
    autoFitColumns(sheet);
}

function addPaymentMethodSheet(workbook: Workbook, expenses: Expense[]): void {
    const sheet = workbook.addWorksheet('By Payment Method');
    sheet.columns = [
        { header: 'payment_method', key: 'payment_method' },
        { header: 'total', key: 'total' },
        { header: 'count', key: 'count' },
    ];

    for (const t of summarizeByPaymentMethod(expenses)) {
        sheet.addRow({ payment_method: t.payment_method, total: amountCell(t.total), count: t.count });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'total');
    autoFitColumns(sheet);
}

function addDailySheet(workbook: Workbook, expenses: Expense[]): void {
    const sheet = workbook.addWorksheet('Daily');
    sheet.columns = [
        { header: 'date', key: 'date' },
        { header: 'total', key: 'total' },
    ];

    for (const d of dailyTotals(expenses)) {
        sheet.addRow({ date: d.date, total: amountCell(d.total) });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'total');
    autoFitColumns(sheet);
}

/**
 * Sheet: Budgets
 * Over-budget rows are highlighted.
 */
function addBudgetSheet(workbook: Workbook, budgets: BudgetStatus[]): void {
    const sheet = workbook.addWorksheet('Budgets');
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'month_year', key: 'month_year' },
        { header: 'budget', key: 'budget' },
        { header: 'spent', key: 'spent' },
        { header: 'remaining', key: 'remaining' },
        { header: 'percent_used', key: 'percent_used' },
        { header: 'over_budget', key: 'over_budget' },
    ];

    for (const b of budgets) {
        const row = sheet.addRow({
            category: b.category,
            month_year: b.month_year,
            budget: amountCell(b.budget),
            spent: amountCell(b.spent),
            remaining: amountCell(b.remaining),
            percent_used: b.percent_used,
            over_budget: b.over_budget ? 'yes' : 'no',
        });
        if (b.over_budget) {
            row.font = { color: { argb: 'FFC00000' } };
        }
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'budget');
    formatCurrencyCell(sheet, 'spent');
    formatCurrencyCell(sheet, 'remaining');
    autoFitColumns(sheet);
}

/**
 * Sheet: Summary
 * Rows: Period, Total income, Total expenses, Net, Expense count, Income count
 */
function addSummarySheet(workbook: Workbook, input: AnalysisInput): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'Metric', key: 'metric' },
        { header: 'Value', key: 'value' },
    ];

    const cashflow = summarizeCashflow(input.expenses, input.income);
    const period = `${input.range.start ?? 'beginning'} to ${input.range.end ?? 'latest'}`;

    sheet.addRow({ metric: 'Period', value: period });
    sheet.addRow({ metric: 'Total income', value: amountCell(cashflow.total_income) });
    sheet.addRow({ metric: 'Total expenses', value: amountCell(cashflow.total_expenses) });
    sheet.addRow({ metric: 'Net', value: amountCell(cashflow.net) });
    sheet.addRow({ metric: 'Expense count', value: cashflow.expense_count });
    sheet.addRow({ metric: 'Income count', value: cashflow.income_count });

    formatHeaderRow(sheet);
    for (const rowNumber of [3, 4, 5]) {
        sheet.getCell(`B${rowNumber}`).numFmt = '#,##0.00;[Red]-#,##0.00';
    }
    autoFitColumns(sheet);
}
