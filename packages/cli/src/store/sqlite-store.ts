/**
 * SQLite-backed ledger (better-sqlite3).
 *
 * Amounts are stored as TEXT so decimal strings round-trip exactly.
 * Every public call runs as one statement or one transaction; a write and
 * its read-back commit together or not at all. Malformed records are
 * rejected with ValidationError before the database is touched; driver
 * failures surface as StorageError.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { StorageError, ValidationError, summarizeByCategory } from '@pocket-ledger/core';
import type {
    LedgerStore,
    Clock,
    Expense,
    Income,
    Budget,
    NewExpense,
    NewIncome,
    BudgetInput,
    DateRange,
    CategoryTotal,
} from '@pocket-ledger/core';
import {
    ExpenseSchema,
    IncomeSchema,
    BudgetSchema,
    NewExpenseSchema,
    NewIncomeSchema,
    BudgetInputSchema,
} from '@pocket-ledger/shared';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount TEXT NOT NULL,
    description TEXT NOT NULL,
    category TEXT NOT NULL,
    payment_method TEXT NOT NULL DEFAULT 'Cash',
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_expenses_date ON expenses(date);

  CREATE TABLE IF NOT EXISTS income (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount TEXT NOT NULL,
    source TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS budgets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    category TEXT NOT NULL UNIQUE,
    amount TEXT NOT NULL,
    month_year TEXT NOT NULL
  );
`;

const ExpenseRowsSchema = z.array(ExpenseSchema);
const IncomeRowsSchema = z.array(IncomeSchema);
const BudgetRowsSchema = z.array(BudgetSchema);

export interface SqliteLedgerOptions {
    clock?: Clock;
}

export class SqliteLedgerStore implements LedgerStore {
    private readonly db: Database.Database;
    private readonly clock: Clock;

    /**
     * @param filename database file, or ':memory:'
     */
    constructor(filename: string, options: SqliteLedgerOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
        this.db = guard('open', () => new Database(filename));
    }

    initialize(): void {
        guard('initialize', () => {
            this.db.transaction(() => this.db.exec(SCHEMA))();
        });
    }

    addExpense(expense: NewExpense): Expense {
        const row = parseInput(NewExpenseSchema, expense);
        return guard('addExpense', () =>
            this.db.transaction(() => {
                const info = this.db
                    .prepare(
                        `INSERT INTO expenses (date, amount, description, category, payment_method, created_at)
                         VALUES (@date, @amount, @description, @category, @paymentMethod, @createdAt)`
                    )
                    .run({ ...row, createdAt: this.clock().toISOString() });
                const rows = this.db.prepare('SELECT * FROM expenses WHERE id = ?').all(Number(info.lastInsertRowid));
                return firstRow(ExpenseRowsSchema.parse(rows), 'expense');
            })()
        );
    }

    addIncome(income: NewIncome): Income {
        const row = parseInput(NewIncomeSchema, income);
        return guard('addIncome', () =>
            this.db.transaction(() => {
                const info = this.db
                    .prepare(
                        `INSERT INTO income (date, amount, source, created_at)
                         VALUES (@date, @amount, @source, @createdAt)`
                    )
                    .run({ ...row, createdAt: this.clock().toISOString() });
                const rows = this.db.prepare('SELECT * FROM income WHERE id = ?').all(Number(info.lastInsertRowid));
                return firstRow(IncomeRowsSchema.parse(rows), 'income');
            })()
        );
    }

    setBudget(budget: BudgetInput): Budget {
        const row = parseInput(BudgetInputSchema, budget);
        return guard('setBudget', () =>
            this.db.transaction(() => {
                this.db
                    .prepare(
                        `INSERT INTO budgets (category, amount, month_year)
                         VALUES (@category, @amount, @monthYear)
                         ON CONFLICT(category) DO UPDATE SET
                           amount = excluded.amount,
                           month_year = excluded.month_year`
                    )
                    .run(row);
                const rows = this.db.prepare('SELECT * FROM budgets WHERE category = ?').all(row.category);
                return firstRow(BudgetRowsSchema.parse(rows), 'budget');
            })()
        );
    }

    getExpenses(range: DateRange = {}): Expense[] {
        return guard('getExpenses', () => {
            const rows = this.selectInRange('expenses', range);
            return ExpenseRowsSchema.parse(rows);
        });
    }

    getCategoryTotals(range: DateRange = {}): CategoryTotal[] {
        return summarizeByCategory(this.getExpenses(range));
    }

    getIncome(range: DateRange = {}): Income[] {
        return guard('getIncome', () => {
            const rows = this.selectInRange('income', range);
            return IncomeRowsSchema.parse(rows);
        });
    }

    getBudgets(): Budget[] {
        return guard('getBudgets', () => {
            const rows = this.db.prepare('SELECT * FROM budgets ORDER BY category').all();
            return BudgetRowsSchema.parse(rows);
        });
    }

    private selectInRange(table: 'expenses' | 'income', range: DateRange): unknown[] {
        const { where, params } = dateFilter(range);
        const stmt = this.db.prepare(`SELECT * FROM ${table} ${where} ORDER BY date DESC, id DESC`);
        return params ? stmt.all(params) : stmt.all();
    }

    close(): void {
        guard('close', () => {
            this.db.close();
        });
    }
}

function guard<T>(operation: string, fn: () => T): T {
    try {
        return fn();
    } catch (e) {
        if (e instanceof StorageError) throw e;
        throw new StorageError(operation, e);
    }
}

/**
 * Rejects malformed records before they reach the database.
 */
function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(
            parsed.error.issues.map((issue) =>
                issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
            )
        );
    }
    return parsed.data;
}

function firstRow<T>(rows: T[], kind: string): T {
    const [row] = rows;
    if (row === undefined) {
        throw new Error(`Inserted ${kind} row could not be read back`);
    }
    return row;
}

function dateFilter(range: DateRange): { where: string; params: Record<string, string> | null } {
    const clauses: string[] = [];
    const params: Record<string, string> = {};
    if (range.start !== undefined) {
        clauses.push('date >= @start');
        params.start = range.start;
    }
    if (range.end !== undefined) {
        clauses.push('date <= @end');
        params.end = range.end;
    }
    if (clauses.length === 0) return { where: '', params: null };
    return { where: `WHERE ${clauses.join(' AND ')}`, params };
}
