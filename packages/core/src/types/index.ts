/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Category,
    PaymentMethod,
    Expense,
    Income,
    Budget,
    NewExpense,
    NewIncome,
    BudgetInput,
    DateRange,
    CategoryTotal,
    PaymentMethodTotal,
    DailyTotal,
    BudgetStatus,
    CashflowSummary,
    TrainingExample,
    CategorizerModel,
    CategorizationResult,
    CategorizationOutput,
    ExpenseParseResult,
} from '@pocket-ledger/shared';

export {
    CategorySchema,
    PaymentMethodSchema,
    ExpenseSchema,
    NewExpenseSchema,
    NewIncomeSchema,
    BudgetInputSchema,
    CategorizerModelSchema,
    CATEGORIES,
    FALLBACK_CATEGORY,
    PAYMENT_METHODS,
    DEFAULT_PAYMENT_METHOD,
    CATEGORIZER,
    EXPENSE_CSV_COLUMNS,
} from '@pocket-ledger/shared';
