/**
 * Categorizer module: text-classifier category suggestions.
 */

export { Categorizer } from './categorizer.js';
export { MemoryModelStore } from './model-store.js';
export { trainModel, compileModel, predict, serializeModel, deserializeModel } from './model.js';
export { tokenize } from './tokenize.js';
export type { CompiledModel, ModelDecodeResult } from './model.js';
export type { ModelStore, Prediction, CategorizerInitResult, CategorizerOptions, SparseVector } from './types.js';
