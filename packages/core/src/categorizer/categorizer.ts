/**
 * Expense categorizer: suggests a category for a free-text description.
 *
 * Two states: uninitialized -> trained. The first call to initialize(),
 * classify() or categorize() loads the persisted model from the injected
 * ModelStore, or trains one from the bundled examples and saves it.
 *
 * Suggestions are advisory. Nothing here throws to the caller: load/save
 * and prediction failures become warnings, and the answer degrades to
 * the fallback category.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in results.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { trainingFingerprint } from '../utils/fingerprint.js';
import { CATEGORIZER, FALLBACK_CATEGORY } from '../types/index.js';
import type { Category, CategorizationOutput, CategorizerModel, TrainingExample } from '../types/index.js';
import { trainModel, compileModel, predict, serializeModel, deserializeModel } from './model.js';
import type { CompiledModel } from './model.js';
import type { CategorizerInitResult, CategorizerOptions, ModelStore } from './types.js';

export class Categorizer {
    private readonly store: ModelStore;
    private readonly examples: readonly TrainingExample[];
    private readonly stopWords: readonly string[];
    private readonly now: () => Date;

    private compiled: CompiledModel | null = null;
    private initResult: CategorizerInitResult | null = null;

    constructor(options: CategorizerOptions) {
        this.store = options.store;
        this.examples = options.examples;
        this.stopWords = options.stopWords ?? [];
        this.now = options.now ?? (() => new Date());
    }

    get isTrained(): boolean {
        return this.compiled !== null;
    }

    /**
     * The model currently in use, once trained.
     */
    get model(): CategorizerModel | null {
        return this.compiled?.model ?? null;
    }

    /**
     * Enter the trained state. Idempotent: later calls return the first result.
     */
    initialize(): CategorizerInitResult {
        if (this.initResult) return this.initResult;

        const warnings: string[] = [];
        const expected = trainingFingerprint(this.examples, this.stopWords);

        const loaded = this.tryLoad(expected, warnings);
        if (loaded) {
            this.compiled = compileModel(loaded);
            this.initResult = { source: 'loaded', warnings };
            return this.initResult;
        }

        try {
            const model = trainModel(this.examples, this.stopWords, this.now());
            this.compiled = compileModel(model);
            this.trySave(model, warnings);
        } catch (e) {
            const errorMsg = e instanceof Error ? e.message : String(e);
            warnings.push(`Categorizer training failed: ${errorMsg}. Suggestions will default to ${FALLBACK_CATEGORY}.`);
        }

        this.initResult = { source: 'trained', warnings };
        return this.initResult;
    }

    /**
     * Suggest a category. Returns FALLBACK_CATEGORY unless the model's
     * confidence is strictly above the threshold.
     */
    categorize(description: string): Category {
        return this.classify(description).result.category;
    }

    /**
     * Suggest a category with the confidence behind it.
     * Warnings include any from initialization on the first call.
     */
    classify(description: string): CategorizationOutput {
        const firstUse = this.initResult === null;
        const init = this.initialize();
        const warnings = firstUse ? [...init.warnings] : [];

        const text = normalizeDescription(description);
        if (text === '' || !this.compiled) {
            return { result: fallback(null, 0), warnings };
        }

        try {
            const { category, confidence } = predict(this.compiled, text);
            if (confidence > CATEGORIZER.CONFIDENCE_THRESHOLD) {
                return {
                    result: { category, predicted: category, confidence, fallback: false },
                    warnings,
                };
            }
            return { result: fallback(category, confidence), warnings };
        } catch (e) {
            const errorMsg = e instanceof Error ? e.message : String(e);
            warnings.push(`Categorization failed for "${description}": ${errorMsg}`);
            return { result: fallback(null, 0), warnings };
        }
    }

    private tryLoad(expectedFingerprint: string, warnings: string[]): CategorizerModel | null {
        let serialized: string | null;
        try {
            serialized = this.store.load();
        } catch (e) {
            const errorMsg = e instanceof Error ? e.message : String(e);
            warnings.push(`Could not read saved categorizer model: ${errorMsg}. Retraining.`);
            return null;
        }
        if (serialized === null) return null;

        const decoded = deserializeModel(serialized);
        if (!decoded.ok) {
            warnings.push(`Saved categorizer model is unusable: ${decoded.reason}. Retraining.`);
            return null;
        }
        if (decoded.model.fingerprint !== expectedFingerprint) {
            warnings.push('Saved categorizer model was trained on different examples. Retraining.');
            return null;
        }
        return decoded.model;
    }

    private trySave(model: CategorizerModel, warnings: string[]): void {
        try {
            this.store.save(serializeModel(model));
        } catch (e) {
            const errorMsg = e instanceof Error ? e.message : String(e);
            warnings.push(`Could not save categorizer model: ${errorMsg}`);
        }
    }
}

function fallback(predicted: Category | null, confidence: number): CategorizationOutput['result'] {
    return { category: FALLBACK_CATEGORY, predicted, confidence, fallback: true };
}
