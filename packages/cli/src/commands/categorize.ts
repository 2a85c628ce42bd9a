import { openWorkspace, createCategorizer } from '../workspace/context.js';
import { log, warn, arrow, fail, errorMessage } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';
import type { CategorizationOutput } from '@pocket-ledger/core';

/**
 * Shows what the categorizer would pick for a description, without recording anything.
 */
export async function categorizeDescription(description: string, options: GlobalOptions): Promise<void> {
    if (description.trim() === '') {
        fail('Description is required');
    }

    let output: CategorizationOutput;
    try {
        output = createCategorizer(openWorkspace(options)).classify(description);
    } catch (err) {
        fail(errorMessage(err));
    }

    for (const w of output.warnings) {
        warn(w);
    }
    const { result } = output;
    log(result.category);
    arrow(`Confidence: ${(result.confidence * 100).toFixed(1)}%`);
    if (result.fallback && result.predicted) {
        arrow(`Best guess ${result.predicted} is below the confidence threshold`);
    }
}
