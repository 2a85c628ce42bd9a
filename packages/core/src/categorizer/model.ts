/**
 * Training, prediction and (de)serialization of the categorizer model.
 *
 * Pipeline: tokenize -> TF-IDF -> multinomial naive Bayes.
 */

import { tokenize } from './tokenize.js';
import { fitIdf, buildIndex, transform } from './tfidf.js';
import { fitNaiveBayes, predictProba } from './naive-bayes.js';
import { trainingFingerprint } from '../utils/fingerprint.js';
import { CATEGORIES, CATEGORIZER, CategorizerModelSchema } from '../types/index.js';
import type { Category, CategorizerModel, TrainingExample } from '../types/index.js';
import type { Prediction } from './types.js';

/**
 * A model plus the lookup structures prediction needs.
 */
export interface CompiledModel {
    model: CategorizerModel;
    index: Map<string, number>;
    stopWords: Set<string>;
}

export type ModelDecodeResult =
    | { ok: true; model: CategorizerModel }
    | { ok: false; reason: string };

/**
 * Train a model from labelled examples.
 *
 * Classes are the categories present in `examples`, in standard category
 * order. Throws if `examples` is empty.
 */
export function trainModel(
    examples: readonly TrainingExample[],
    stopWords: readonly string[] = [],
    now: Date = new Date()
): CategorizerModel {
    if (examples.length === 0) {
        throw new Error('Cannot train categorizer: no training examples');
    }

    const stopSet = new Set(stopWords);
    const documents = examples.map((ex) => tokenize(ex.description, stopSet));
    const { vocabulary, idf } = fitIdf(documents);
    const index = buildIndex(vocabulary);

    const present = new Set(examples.map((ex) => ex.category));
    const classes: Category[] = CATEGORIES.filter((c) => present.has(c));
    const labels = examples.map((ex) => classes.indexOf(ex.category));

    const vectors = documents.map((tokens) => transform(tokens, index, idf));
    const fit = fitNaiveBayes(vectors, labels, classes.length, vocabulary.length, CATEGORIZER.SMOOTHING);

    return {
        version: CATEGORIZER.MODEL_VERSION,
        fingerprint: trainingFingerprint(examples, stopWords),
        trained_at: now.toISOString(),
        stop_words: [...stopSet].sort(),
        vocabulary,
        idf,
        classes,
        class_log_prior: fit.class_log_prior,
        feature_log_prob: fit.feature_log_prob,
    };
}

export function compileModel(model: CategorizerModel): CompiledModel {
    return {
        model,
        index: buildIndex(model.vocabulary),
        stopWords: new Set(model.stop_words),
    };
}

/**
 * Most probable class for a description. Ties go to the earlier class.
 */
export function predict(compiled: CompiledModel, description: string): Prediction {
    const { model, index, stopWords } = compiled;
    const vector = transform(tokenize(description, stopWords), index, model.idf);
    const proba = predictProba(model, vector);

    let best = 0;
    for (let c = 1; c < proba.length; c++) {
        if (proba[c] > proba[best]) best = c;
    }
    return { category: model.classes[best], confidence: proba[best] };
}

export function serializeModel(model: CategorizerModel): string {
    return JSON.stringify(model);
}

/**
 * Parse and validate a serialized model. Never throws.
 */
export function deserializeModel(serialized: string): ModelDecodeResult {
    let data: unknown;
    try {
        data = JSON.parse(serialized);
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        return { ok: false, reason: `not valid JSON (${errorMsg})` };
    }

    const parsed = CategorizerModelSchema.safeParse(data);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const where = first.path.length > 0 ? `${first.path.join('.')}: ` : '';
        return { ok: false, reason: `schema mismatch (${where}${first.message})` };
    }
    if (parsed.data.version !== CATEGORIZER.MODEL_VERSION) {
        return { ok: false, reason: `unsupported model version ${parsed.data.version}` };
    }
    return { ok: true, model: parsed.data };
}
