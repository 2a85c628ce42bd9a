import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Categorizer } from '@pocket-ledger/core';
import { detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace, resolveAssetPaths } from './paths.js';
import { loadSettings, loadTrainingExamples, loadStopWords } from './config.js';
import { SqliteLedgerStore } from '../store/sqlite-store.js';
import { FileModelStore } from '../store/model-store.js';
import type { GlobalOptions, Workspace } from '../types.js';

/**
 * Finds the workspace (--workspace, else the nearest ancestor holding
 * config/settings.yaml) and loads its settings.
 */
export function openWorkspace(options: GlobalOptions): Workspace {
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        throw new Error('Workspace not found. Run "init" first, or pass --workspace.');
    }
    return resolveWorkspace(root, loadSettings(root));
}

/**
 * Opens the ledger database, creating its directory and tables when missing.
 */
export function openLedger(workspace: Workspace): SqliteLedgerStore {
    const path = workspace.config.databasePath;
    mkdirSync(dirname(path), { recursive: true });
    const store = new SqliteLedgerStore(path);
    store.initialize();
    return store;
}

export function createCategorizer(workspace: Workspace): Categorizer {
    const assets = resolveAssetPaths();
    return new Categorizer({
        store: new FileModelStore(workspace.config.modelPath),
        examples: loadTrainingExamples(assets.trainingExamplesPath),
        stopWords: loadStopWords(assets.stopWordsPath),
    });
}
