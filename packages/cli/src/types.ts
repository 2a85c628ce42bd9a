/**
 * Pocket Ledger CLI - Core Types
 */

import type { Settings } from '@pocket-ledger/shared';

export interface GlobalOptions {
    workspace?: string;
}

export interface AddExpenseOptions extends GlobalOptions {
    date?: string;
    amount?: string;
    description?: string;
    category?: string;
    payment?: string;
    custom: boolean;
}

export interface AddIncomeOptions extends GlobalOptions {
    date?: string;
    amount?: string;
    source?: string;
}

export interface SetBudgetOptions extends GlobalOptions {
    category?: string;
    amount?: string;
    month?: string;
    custom: boolean;
}

export interface RangeOptions extends GlobalOptions {
    from?: string;
    to?: string;
}

export interface BudgetReportOptions extends GlobalOptions {
    month?: string;
}

export interface OutputOptions extends RangeOptions {
    out?: string;
}

export interface WorkspaceConfig {
    settingsPath: string;
    databasePath: string;
    modelPath: string;
}

export interface Workspace {
    root: string;
    exports: string;
    settings: Settings;
    config: WorkspaceConfig;
}

/**
 * Files bundled with the CLI package.
 */
export interface AssetPaths {
    trainingExamplesPath: string;
    stopWordsPath: string;
}
