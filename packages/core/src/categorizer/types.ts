/**
 * Internal types for categorizer module.
 */

import type { Category, TrainingExample } from '../types/index.js';

/**
 * Feature index -> weight. Only non-zero weights are stored.
 */
export type SparseVector = Map<number, number>;

/**
 * Top class and its probability.
 */
export interface Prediction {
    category: Category;
    confidence: number;
}

/**
 * Persistence for the serialized trained model.
 *
 * load() returns null when nothing has been saved yet. Either method may
 * throw; the categorizer treats that as a warning, never as fatal.
 */
export interface ModelStore {
    load(): string | null;
    save(serialized: string): void;
}

/**
 * How the categorizer reached the trained state.
 */
export interface CategorizerInitResult {
    source: 'loaded' | 'trained';
    warnings: string[];
}

export interface CategorizerOptions {
    store: ModelStore;
    examples: readonly TrainingExample[];
    stopWords?: readonly string[];
    /** Timestamp source for trained_at. */
    now?: () => Date;
}
