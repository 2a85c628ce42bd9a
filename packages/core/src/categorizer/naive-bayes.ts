/**
 * Multinomial naive Bayes over TF-IDF features.
 */

import type { SparseVector } from './types.js';

export interface NaiveBayesFit {
    class_log_prior: number[];
    feature_log_prob: number[][];
}

/**
 * Fit class priors and smoothed per-class term log likelihoods.
 *
 * @param vectors - One feature vector per training document
 * @param labels - Class index of each document
 * @param classCount - Number of classes
 * @param featureCount - Vocabulary size
 * @param alpha - Additive smoothing, > 0
 */
export function fitNaiveBayes(
    vectors: readonly SparseVector[],
    labels: readonly number[],
    classCount: number,
    featureCount: number,
    alpha: number
): NaiveBayesFit {
    const docsPerClass = new Array<number>(classCount).fill(0);
    const featureTotals = Array.from({ length: classCount }, () => new Array<number>(featureCount).fill(0));

    vectors.forEach((vector, i) => {
        const c = labels[i];
        docsPerClass[c]++;
        for (const [j, w] of vector) {
            featureTotals[c][j] += w;
        }
    });

    const n = vectors.length;
    const class_log_prior = docsPerClass.map((count) => Math.log(count / n));
    const feature_log_prob = featureTotals.map((row) => {
        const denom = row.reduce((sum, v) => sum + v, 0) + alpha * featureCount;
        return row.map((v) => Math.log((v + alpha) / denom));
    });

    return { class_log_prior, feature_log_prob };
}

/**
 * Posterior class probabilities (softmax of the joint log likelihood).
 * An empty vector returns the priors.
 */
export function predictProba(fit: NaiveBayesFit, vector: SparseVector): number[] {
    const jll = fit.class_log_prior.map((prior, c) => {
        let score = prior;
        for (const [j, w] of vector) {
            score += w * fit.feature_log_prob[c][j];
        }
        return score;
    });

    const max = Math.max(...jll);
    const exp = jll.map((v) => Math.exp(v - max));
    const total = exp.reduce((sum, v) => sum + v, 0);
    return exp.map((v) => v / total);
}
