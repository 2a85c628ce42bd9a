/**
 * Boundary validation for user-entered ledger data.
 *
 * Everything here runs before the store is touched. Each validator
 * collects every problem and throws a single ValidationError.
 */

import { Decimal } from 'decimal.js';
import { ValidationError } from '../errors.js';
import { parseIsoDate, parseMonth } from '../utils/date-parse.js';
import { labelKey } from '../utils/normalize.js';
import { CATEGORIES, PAYMENT_METHODS, DEFAULT_PAYMENT_METHOD } from '../types/index.js';
import type { Category, PaymentMethod, NewExpense, NewIncome, BudgetInput, DateRange } from '../types/index.js';
import type {
    AmountCheck,
    CategoryChoice,
    CategoryOptions,
    ExpenseFields,
    IncomeFields,
    BudgetFields,
} from './types.js';

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parse a typed amount ("1,234.50", "$12", "-3.5").
 * Zero counts as missing, matching the entry form's required-field check.
 */
export function checkAmount(raw: string | undefined): AmountCheck {
    if (raw === undefined || raw.trim() === '') {
        return { ok: false, issue: 'Amount is required' };
    }

    const cleaned = raw.trim().replace(/,/g, '').replace(/^(-?)\$/, '$1');
    if (!AMOUNT_PATTERN.test(cleaned)) {
        return { ok: false, issue: `Amount "${raw}" is not a valid number` };
    }
    if (new Decimal(cleaned).isZero()) {
        return { ok: false, issue: 'Amount must not be zero' };
    }
    return { ok: true, amount: cleaned };
}

/**
 * Throwing form of checkAmount.
 */
export function parseAmountInput(raw: string | undefined): string {
    const result = checkAmount(raw);
    if (!result.ok) {
        throw new ValidationError([result.issue]);
    }
    return result.amount;
}

export function isCategory(value: string): value is Category {
    return CATEGORIES.some((c) => c === value);
}

/**
 * Match a typed category against the standard set, case-insensitively.
 * Unknown labels become custom categories only when allowed.
 *
 * @returns the choice, or null when the label is empty or unknown and custom labels are off
 */
export function matchCategory(raw: string, options: CategoryOptions = {}): CategoryChoice | null {
    const key = labelKey(raw);
    if (key === '') return null;

    const standard = CATEGORIES.find((c) => labelKey(c) === key);
    if (standard) {
        return { kind: 'standard', category: standard };
    }
    if (options.allowCustom) {
        return { kind: 'custom', label: raw.trim().replace(/\s+/g, ' ') };
    }
    return null;
}

export function resolveCategory(raw: string, options: CategoryOptions = {}): CategoryChoice {
    const choice = matchCategory(raw, options);
    if (!choice) {
        throw new ValidationError([categoryIssue(raw)]);
    }
    return choice;
}

/**
 * Text stored in the category column.
 */
export function categoryLabel(choice: CategoryChoice): string {
    return choice.kind === 'standard' ? choice.category : choice.label;
}

export function matchPaymentMethod(raw: string | undefined): PaymentMethod | null {
    if (raw === undefined || raw.trim() === '') return DEFAULT_PAYMENT_METHOD;
    const key = labelKey(raw);
    return PAYMENT_METHODS.find((m) => labelKey(m) === key) ?? null;
}

export function resolvePaymentMethod(raw: string | undefined): PaymentMethod {
    const method = matchPaymentMethod(raw);
    if (!method) {
        throw new ValidationError([paymentIssue(raw ?? '')]);
    }
    return method;
}

/**
 * Validate the add-expense form. The category must already be decided
 * (typed, or suggested by the categorizer) by the time this runs.
 */
export function validateExpenseInput(fields: ExpenseFields, options: CategoryOptions = {}): NewExpense {
    const issues: string[] = [];

    const date = fields.date?.trim() ?? '';
    checkDate('Date', date, issues);

    const amount = checkAmount(fields.amount);
    if (!amount.ok) issues.push(amount.issue);

    const description = fields.description?.trim() ?? '';
    if (description === '') issues.push('Description is required');

    const rawCategory = fields.category ?? '';
    const category = matchCategory(rawCategory, options);
    if (!category) issues.push(categoryIssue(rawCategory));

    const paymentMethod = matchPaymentMethod(fields.paymentMethod);
    if (!paymentMethod) issues.push(paymentIssue(fields.paymentMethod ?? ''));

    if (issues.length > 0 || !amount.ok || !category || !paymentMethod) {
        throw new ValidationError(issues);
    }

    return {
        date,
        amount: amount.amount,
        description,
        category: categoryLabel(category),
        paymentMethod,
    };
}

export function validateIncomeInput(fields: IncomeFields): NewIncome {
    const issues: string[] = [];

    const date = fields.date?.trim() ?? '';
    checkDate('Date', date, issues);

    const amount = checkAmount(fields.amount);
    if (!amount.ok) issues.push(amount.issue);

    const source = fields.source?.trim() ?? '';
    if (source === '') issues.push('Source is required');

    if (issues.length > 0 || !amount.ok) {
        throw new ValidationError(issues);
    }

    return { date, amount: amount.amount, source };
}

/**
 * Budgets may only target categories the user can pick, so custom labels
 * follow the same allowCustom switch as expenses.
 */
export function validateBudgetInput(fields: BudgetFields, options: CategoryOptions = {}): BudgetInput {
    const issues: string[] = [];

    const rawCategory = fields.category ?? '';
    const category = matchCategory(rawCategory, options);
    if (!category) issues.push(categoryIssue(rawCategory));

    const amount = checkAmount(fields.amount);
    if (!amount.ok) {
        issues.push(amount.issue);
    } else if (new Decimal(amount.amount).isNegative()) {
        issues.push('Budget amount must be positive');
    }

    const monthYear = fields.monthYear?.trim() ?? '';
    if (monthYear === '') {
        issues.push('Month is required');
    } else if (!parseMonth(monthYear)) {
        issues.push(`Month "${monthYear}" must be YYYY-MM`);
    }

    if (issues.length > 0 || !amount.ok || !category) {
        throw new ValidationError(issues);
    }

    return { category: categoryLabel(category), amount: amount.amount, monthYear };
}

/**
 * Validate optional filter bounds. Start must not be after end.
 */
export function validateDateRange(start?: string, end?: string): DateRange {
    const issues: string[] = [];
    const range: DateRange = {};

    if (start !== undefined) {
        if (checkDate('Start date', start, issues)) range.start = start;
    }
    if (end !== undefined) {
        if (checkDate('End date', end, issues)) range.end = end;
    }
    if (range.start && range.end && range.start > range.end) {
        issues.push(`Start date ${range.start} is after end date ${range.end}`);
    }

    if (issues.length > 0) {
        throw new ValidationError(issues);
    }
    return range;
}

function checkDate(label: string, value: string, issues: string[]): boolean {
    if (value === '') {
        issues.push(`${label} is required`);
        return false;
    }
    if (!parseIsoDate(value)) {
        issues.push(`${label} "${value}" must be a calendar date in YYYY-MM-DD format`);
        return false;
    }
    return true;
}

function categoryIssue(raw: string): string {
    if (raw.trim() === '') return 'Category is required';
    return `Unknown category "${raw}". Expected one of: ${CATEGORIES.join(', ')}`;
}

function paymentIssue(raw: string): string {
    return `Unknown payment method "${raw}". Expected one of: ${PAYMENT_METHODS.join(', ')}`;
}
