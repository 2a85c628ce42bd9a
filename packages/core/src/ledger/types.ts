import type {
    Expense,
    Income,
    Budget,
    NewExpense,
    NewIncome,
    BudgetInput,
    DateRange,
    CategoryTotal,
} from '../types/index.js';

/**
 * Durable ledger of expenses, income and budgets.
 *
 * Each call is independently atomic: it either fully commits or has no
 * effect. Implementations throw StorageError on any backing-store failure.
 * Records are append-only; there is no update or delete.
 */
export interface LedgerStore {
    /** Create missing tables. Safe to call on every startup. */
    initialize(): void;

    /** Payment method defaults to Cash. */
    addExpense(expense: NewExpense): Expense;
    addIncome(income: NewIncome): Income;

    /** Insert or replace the budget for `category`; last write wins. */
    setBudget(budget: BudgetInput): Budget;

    /** Inclusive on both bounds, newest first, ties by id descending. */
    getExpenses(range?: DateRange): Expense[];

    /** Non-empty categories only, largest total first. */
    getCategoryTotals(range?: DateRange): CategoryTotal[];

    getIncome(range?: DateRange): Income[];

    /** Ordered by category. */
    getBudgets(): Budget[];

    close(): void;
}

/**
 * Source of creation timestamps. Injected so tests can pin time.
 */
export type Clock = () => Date;
