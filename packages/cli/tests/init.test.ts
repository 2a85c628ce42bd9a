import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { deserializeModel } from '@pocket-ledger/core';
import { initWorkspace } from '../src/commands/init.js';
import { openWorkspace, openLedger } from '../src/workspace/context.js';

describe('init command', () => {
    let root: string;
    let logs: string[];

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'pledger-init-'));
        logs = [];
        vi.spyOn(console, 'log').mockImplementation((message: string) => {
            logs.push(message);
        });
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(root, { recursive: true, force: true });
    });

    it('creates settings, ledger and a trained model', async () => {
        await initWorkspace({ workspace: root });

        expect(existsSync(join(root, 'config', 'settings.yaml'))).toBe(true);
        expect(existsSync(join(root, 'data', 'ledger.db'))).toBe(true);

        const decoded = deserializeModel(readFileSync(join(root, 'data', 'categorizer-model.json'), 'utf-8'));
        expect(decoded.ok).toBe(true);
        expect(logs).toContain(`✓ Categorizer model trained: ${join(root, 'data', 'categorizer-model.json')}`);
    });

    it('reuses the saved model and keeps ledger rows on a second run', async () => {
        await initWorkspace({ workspace: root });

        const workspace = openWorkspace({ workspace: root });
        const store = openLedger(workspace);
        store.addExpense({ date: '2026-01-02', amount: '4', description: 'coffee shop', category: 'Food & Dining' });
        store.close();

        logs = [];
        await initWorkspace({ workspace: root });

        expect(logs).toContain('→ Keeping existing config/settings.yaml');
        expect(logs).toContain(`✓ Categorizer model loaded: ${join(root, 'data', 'categorizer-model.json')}`);

        const reopened = openLedger(workspace);
        try {
            expect(reopened.getExpenses()).toHaveLength(1);
        } finally {
            reopened.close();
        }
    });
});
