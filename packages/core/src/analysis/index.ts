/**
 * Analysis module: totals behind the spending reports.
 */

export { summarizeByCategory, summarizeByPaymentMethod, dailyTotals, summarizeCashflow } from './summarize.js';
export { compareBudgets } from './budget.js';
