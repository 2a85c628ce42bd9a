// Schemas
export {
    isoDateString,
    monthString,
    decimalString,
    CategorySchema,
    PaymentMethodSchema,
    ExpenseSchema,
    IncomeSchema,
    BudgetSchema,
    NewExpenseSchema,
    NewIncomeSchema,
    BudgetInputSchema,
    DateRangeSchema,
    CategoryTotalSchema,
    PaymentMethodTotalSchema,
    DailyTotalSchema,
    BudgetStatusSchema,
    CashflowSummarySchema,
    TrainingExampleSchema,
    TrainingSetSchema,
    StopWordsSchema,
    CategorizerModelSchema,
    CategorizationResultSchema,
    CategorizationOutputSchema,
    ExpenseParseResultSchema,
    SettingsSchema,
} from './schemas.js';

// Types
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
    Settings,
} from './schemas.js';

// Constants
export {
    CATEGORIES,
    FALLBACK_CATEGORY,
    PAYMENT_METHODS,
    DEFAULT_PAYMENT_METHOD,
    CATEGORIZER,
    DEFAULT_SETTINGS,
    EXPENSE_CSV_COLUMNS,
} from './constants.js';
