import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Settings } from '@pocket-ledger/shared';
import { SETTINGS_RELATIVE_PATH } from './detect.js';
import type { AssetPaths, Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace from its root and loaded settings.
 * Relative settings paths are taken from the workspace root.
 */
export function resolveWorkspace(root: string, settings: Settings): Workspace {
    return {
        root,
        exports: resolve(root, settings.exports),
        settings,
        config: {
            settingsPath: getSettingsPath(root),
            databasePath: resolve(root, settings.database),
            modelPath: resolve(root, settings.model),
        },
    };
}

export function getSettingsPath(root: string): string {
    return join(root, SETTINGS_RELATIVE_PATH);
}

/**
 * Locates the training examples and stop words shipped in packages/cli/assets.
 */
export function resolveAssetPaths(): AssetPaths {
    // packages/cli/src/workspace -> packages/cli
    const pkgRoot = join(__dirname, '..', '..');
    return {
        trainingExamplesPath: join(pkgRoot, 'assets', 'training-examples.yaml'),
        stopWordsPath: join(pkgRoot, 'assets', 'stop-words.json'),
    };
}

export function getExportPath(workspace: Workspace, filename: string): string {
    return join(workspace.exports, filename);
}
