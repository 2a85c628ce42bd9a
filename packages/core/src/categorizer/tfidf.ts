/**
 * TF-IDF vectorization.
 *
 * idf(t) = ln((1 + n) / (1 + df(t))) + 1   (smoothed, never zero)
 * tf-idf(t, d) = count(t, d) * idf(t), then each row is L2-normalized.
 */

import type { SparseVector } from './types.js';

export interface IdfFit {
    vocabulary: string[];
    idf: number[];
}

/**
 * Learn the vocabulary (sorted) and idf weights from tokenized documents.
 */
export function fitIdf(documents: readonly string[][]): IdfFit {
    const docFreq = new Map<string, number>();
    for (const tokens of documents) {
        for (const term of new Set(tokens)) {
            docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
        }
    }

    const n = documents.length;
    const vocabulary = [...docFreq.keys()].sort();
    const idf = vocabulary.map((term) => Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1);
    return { vocabulary, idf };
}

export function buildIndex(vocabulary: readonly string[]): Map<string, number> {
    return new Map(vocabulary.map((term, i) => [term, i]));
}

/**
 * Vectorize one tokenized document. Out-of-vocabulary terms are ignored;
 * a document with no known terms yields an empty vector.
 */
export function transform(tokens: readonly string[], index: ReadonlyMap<string, number>, idf: readonly number[]): SparseVector {
    const weights: SparseVector = new Map();
    for (const token of tokens) {
        const j = index.get(token);
        if (j === undefined) continue;
        weights.set(j, (weights.get(j) ?? 0) + idf[j]);
    }

    let norm = 0;
    for (const w of weights.values()) norm += w * w;
    norm = Math.sqrt(norm);
    if (norm === 0) return weights;

    for (const [j, w] of weights) weights.set(j, w / norm);
    return weights;
}
