// Types (re-exported from shared)
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
} from './types/index.js';

export {
    CATEGORIES,
    FALLBACK_CATEGORY,
    PAYMENT_METHODS,
    DEFAULT_PAYMENT_METHOD,
    CATEGORIZER,
    EXPENSE_CSV_COLUMNS,
} from './types/index.js';

// Errors
export { ValidationError, StorageError } from './errors.js';

// Utils
export {
    parseIsoDate,
    parseMonth,
    formatIsoDate,
    formatLocalDate,
    addDays,
    monthRange,
    trailingRange,
    normalizeDescription,
    sumAmounts,
    toAmountString,
    formatMoney,
    trainingFingerprint,
} from './utils/index.js';

// Validation
export {
    parseAmountInput,
    resolveCategory,
    categoryLabel,
    resolvePaymentMethod,
    validateExpenseInput,
    validateIncomeInput,
    validateBudgetInput,
    validateDateRange,
} from './validation/index.js';
export type { CategoryChoice, CategoryOptions, ExpenseFields, IncomeFields, BudgetFields } from './validation/index.js';

// Ledger
export type { LedgerStore, Clock } from './ledger/index.js';

// Analysis
export {
    summarizeByCategory,
    summarizeByPaymentMethod,
    dailyTotals,
    summarizeCashflow,
    compareBudgets,
} from './analysis/index.js';

// Categorizer
export { Categorizer, MemoryModelStore, trainModel, serializeModel, deserializeModel } from './categorizer/index.js';
export type { ModelStore, CategorizerInitResult, CategorizerOptions } from './categorizer/index.js';

// Export
export { serializeExpensesCsv, parseExpensesCsv } from './export/index.js';
