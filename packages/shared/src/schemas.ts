/**
 * Zod schemas for Pocket Ledger data structures.
 *
 * IMPORTANT: Money values are stored as decimal strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { CATEGORIES, PAYMENT_METHODS, DEFAULT_PAYMENT_METHOD, DEFAULT_SETTINGS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Month string format: YYYY-MM
 */
export const monthString = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Must be YYYY-MM format');

/**
 * Decimal amount as string (never native number for money).
 * Sign is allowed; the store does not enforce positivity.
 */
export const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const recordId = z.number().int().positive();

// ============================================================================
// Enumerations
// ============================================================================

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

export const PaymentMethodSchema = z.enum(PAYMENT_METHODS);

export type PaymentMethod = z.infer<typeof PaymentMethodSchema>;

// ============================================================================
// Ledger Records
// ============================================================================

/**
 * Persisted expense. `category` holds either a standard category name
 * or a custom label accepted at the input boundary.
 */
export const ExpenseSchema = z.object({
    id: recordId,
    date: isoDateString,
    amount: decimalString,
    description: z.string().min(1),
    category: z.string().min(1),
    payment_method: PaymentMethodSchema,
    created_at: z.string(),
});

export type Expense = z.infer<typeof ExpenseSchema>;

export const IncomeSchema = z.object({
    id: recordId,
    date: isoDateString,
    amount: decimalString,
    source: z.string().min(1),
    created_at: z.string(),
});

export type Income = z.infer<typeof IncomeSchema>;

/**
 * Monthly budget target. At most one per category.
 */
export const BudgetSchema = z.object({
    id: recordId,
    category: z.string().min(1),
    amount: decimalString,
    month_year: monthString,
});

export type Budget = z.infer<typeof BudgetSchema>;

// ============================================================================
// Store Inputs
// ============================================================================

export const NewExpenseSchema = z.object({
    date: isoDateString,
    amount: decimalString,
    description: z.string().min(1),
    category: z.string().min(1),
    paymentMethod: PaymentMethodSchema.default(DEFAULT_PAYMENT_METHOD),
});

export type NewExpense = z.input<typeof NewExpenseSchema>;

export const NewIncomeSchema = z.object({
    date: isoDateString,
    amount: decimalString,
    source: z.string().min(1),
});

export type NewIncome = z.infer<typeof NewIncomeSchema>;

export const BudgetInputSchema = z.object({
    category: z.string().min(1),
    amount: decimalString,
    monthYear: monthString,
});

export type BudgetInput = z.infer<typeof BudgetInputSchema>;

/**
 * Inclusive date filter. Either bound may be omitted.
 */
export const DateRangeSchema = z.object({
    start: isoDateString.optional(),
    end: isoDateString.optional(),
});

export type DateRange = z.infer<typeof DateRangeSchema>;

// ============================================================================
// Aggregates
// ============================================================================

export const CategoryTotalSchema = z.object({
    category: z.string(),
    total: decimalString,
    count: z.number().int().min(1),
});

export type CategoryTotal = z.infer<typeof CategoryTotalSchema>;

export const PaymentMethodTotalSchema = z.object({
    payment_method: z.string(),
    total: decimalString,
    count: z.number().int().min(1),
});

export type PaymentMethodTotal = z.infer<typeof PaymentMethodTotalSchema>;

export const DailyTotalSchema = z.object({
    date: isoDateString,
    total: decimalString,
});

export type DailyTotal = z.infer<typeof DailyTotalSchema>;

export const BudgetStatusSchema = z.object({
    category: z.string(),
    month_year: monthString,
    budget: decimalString,
    spent: decimalString,
    remaining: decimalString,
    percent_used: z.number().nullable(),
    over_budget: z.boolean(),
});

export type BudgetStatus = z.infer<typeof BudgetStatusSchema>;

export const CashflowSummarySchema = z.object({
    total_income: decimalString,
    total_expenses: decimalString,
    net: decimalString,
    expense_count: z.number().int().min(0),
    income_count: z.number().int().min(0),
});

export type CashflowSummary = z.infer<typeof CashflowSummarySchema>;

// ============================================================================
// Categorization Schemas
// ============================================================================

/**
 * One labelled description used to train the categorizer.
 */
export const TrainingExampleSchema = z.object({
    description: z.string().min(1),
    category: CategorySchema,
});

export type TrainingExample = z.infer<typeof TrainingExampleSchema>;

export const TrainingSetSchema = z.object({
    examples: z.array(TrainingExampleSchema).min(1),
});

export const StopWordsSchema = z.array(z.string().min(1));

/**
 * Serialized trained model. Row i of `feature_log_prob` belongs to `classes[i]`;
 * column j belongs to `vocabulary[j]`.
 */
export const CategorizerModelSchema = z
    .object({
        version: z.number().int(),
        fingerprint: z.string(),
        trained_at: z.string(),
        stop_words: z.array(z.string()),
        vocabulary: z.array(z.string()),
        idf: z.array(z.number()),
        classes: z.array(CategorySchema).min(1),
        class_log_prior: z.array(z.number()),
        feature_log_prob: z.array(z.array(z.number())),
    })
    .refine((m) => m.idf.length === m.vocabulary.length, {
        message: 'idf length must match vocabulary length',
    })
    .refine(
        (m) =>
            m.class_log_prior.length === m.classes.length &&
            m.feature_log_prob.length === m.classes.length,
        { message: 'class arrays must match classes length' }
    )
    .refine((m) => m.feature_log_prob.every((row) => row.length === m.vocabulary.length), {
        message: 'feature_log_prob rows must match vocabulary length',
    });

export type CategorizerModel = z.infer<typeof CategorizerModelSchema>;

/**
 * Categorization result - what classify() returns.
 * `predicted` is the model's top class; `category` is what the caller should use.
 */
export const CategorizationResultSchema = z.object({
    category: CategorySchema,
    predicted: CategorySchema.nullable(),
    confidence: z.number().min(0).max(1),
    fallback: z.boolean(),
});

export type CategorizationResult = z.infer<typeof CategorizationResultSchema>;

/**
 * Categorization output - wraps result with warnings.
 * Per architectural constraint: no console.* in core.
 */
export const CategorizationOutputSchema = z.object({
    result: CategorizationResultSchema,
    warnings: z.array(z.string()),
});

export type CategorizationOutput = z.infer<typeof CategorizationOutputSchema>;

// ============================================================================
// Export Schemas
// ============================================================================

/**
 * Result returned by CSV parsing.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const ExpenseParseResultSchema = z.object({
    expenses: z.array(ExpenseSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type ExpenseParseResult = z.infer<typeof ExpenseParseResultSchema>;

// ============================================================================
// Workspace Settings
// ============================================================================

/**
 * config/settings.yaml. Paths are relative to the workspace root.
 */
export const SettingsSchema = z.object({
    database: z.string().min(1).default(DEFAULT_SETTINGS.database),
    model: z.string().min(1).default(DEFAULT_SETTINGS.model),
    exports: z.string().min(1).default(DEFAULT_SETTINGS.exports),
    default_range_days: z.number().int().positive().default(DEFAULT_SETTINGS.default_range_days),
});

export type Settings = z.infer<typeof SettingsSchema>;
