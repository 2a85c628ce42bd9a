/**
 * Training-set fingerprint.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import type { TrainingExample } from '../types/index.js';

const FINGERPRINT_LENGTH = 16;

/**
 * Hash of everything a trained model depends on.
 *
 * Payload format: one "{description}|{category}" line per example, then
 * the sorted stop words joined by ",". Example order matters (it fixes
 * class order), stop word order does not.
 */
export function trainingFingerprint(examples: readonly TrainingExample[], stopWords: readonly string[]): string {
    const lines = examples.map((ex) => `${ex.description}|${ex.category}`);
    const stops = [...stopWords].sort().join(',');
    const payload = `${lines.join('\n')}\n${stops}`;
    return sha256(payload).slice(0, FINGERPRINT_LENGTH);
}
