import { resolve } from 'node:path';
import { writeDefaultSettings, loadSettings } from '../workspace/config.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { openLedger, createCategorizer } from '../workspace/context.js';
import { log, success, warn, arrow, fail, errorMessage } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

/**
 * Sets up a workspace: settings file, ledger tables and a trained categorizer model.
 * Safe to re-run.
 */
export async function initWorkspace(options: GlobalOptions): Promise<void> {
    const root = resolve(options.workspace || process.cwd());
    log(`\nPocket Ledger - Initializing ${root}`);

    try {
        if (writeDefaultSettings(root)) {
            arrow('Wrote config/settings.yaml with default settings');
        } else {
            arrow('Keeping existing config/settings.yaml');
        }

        const workspace = resolveWorkspace(root, loadSettings(root));

        const store = openLedger(workspace);
        store.close();
        success(`Ledger ready: ${workspace.config.databasePath}`);

        const init = createCategorizer(workspace).initialize();
        for (const w of init.warnings) {
            warn(w);
        }
        success(
            init.source === 'loaded'
                ? `Categorizer model loaded: ${workspace.config.modelPath}`
                : `Categorizer model trained: ${workspace.config.modelPath}`
        );
    } catch (err) {
        fail(errorMessage(err));
    }
}
