/**
 * Validation module: user input checks run before the store.
 */

export {
    checkAmount,
    parseAmountInput,
    isCategory,
    matchCategory,
    resolveCategory,
    categoryLabel,
    matchPaymentMethod,
    resolvePaymentMethod,
    validateExpenseInput,
    validateIncomeInput,
    validateBudgetInput,
    validateDateRange,
} from './input.js';
export type {
    AmountCheck,
    CategoryChoice,
    CategoryOptions,
    ExpenseFields,
    IncomeFields,
    BudgetFields,
} from './types.js';
