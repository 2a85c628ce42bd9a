/**
 * Ledger module: store contract shared by every backing implementation.
 */

export type { LedgerStore, Clock } from './types.js';
