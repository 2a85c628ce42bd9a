/**
 * Constants for Pocket Ledger.
 */

/**
 * The closed set of expense categories the categorizer predicts.
 * Order is the order shown to users.
 */
export const CATEGORIES = [
    'Food & Dining',
    'Transportation',
    'Shopping',
    'Entertainment',
    'Bills & Utilities',
    'Healthcare',
    'Education',
    'Travel',
    'Personal Care',
    'Home & Garden',
    'Miscellaneous',
] as const;

/**
 * Fallback category for low-confidence or failed categorization.
 */
export const FALLBACK_CATEGORY = 'Miscellaneous' satisfies (typeof CATEGORIES)[number];

export const PAYMENT_METHODS = [
    'Cash',
    'Credit Card',
    'Debit Card',
    'Bank Transfer',
    'Digital Wallet',
] as const;

export const DEFAULT_PAYMENT_METHOD = 'Cash' satisfies (typeof PAYMENT_METHODS)[number];

/**
 * Categorizer tuning.
 *
 * A prediction is only surfaced when its class probability is strictly
 * greater than CONFIDENCE_THRESHOLD; otherwise FALLBACK_CATEGORY is used.
 * SMOOTHING is the additive (Lidstone) smoothing of the naive Bayes term
 * likelihoods.
 */
export const CATEGORIZER = {
    CONFIDENCE_THRESHOLD: 0.3,
    SMOOTHING: 0.1,
    MIN_TOKEN_LENGTH: 2,
    MODEL_VERSION: 1,
} as const;

/**
 * Workspace defaults, overridable in config/settings.yaml.
 */
export const DEFAULT_SETTINGS = {
    database: 'data/ledger.db',
    model: 'data/categorizer-model.json',
    exports: 'exports',
    default_range_days: 30,
} as const;

/**
 * Column order of the expense CSV export.
 */
export const EXPENSE_CSV_COLUMNS = [
    'id',
    'date',
    'amount',
    'description',
    'category',
    'payment_method',
    'created_at',
] as const;
