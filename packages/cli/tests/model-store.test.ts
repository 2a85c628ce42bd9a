import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Categorizer } from '@pocket-ledger/core';
import { FileModelStore } from '../src/store/model-store.js';

describe('FileModelStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'pledger-model-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('loads null when nothing was saved', () => {
        expect(new FileModelStore(join(dir, 'model.json')).load()).toBeNull();
    });

    it('creates missing directories on save and reads back what it wrote', () => {
        const path = join(dir, 'data', 'nested', 'model.json');
        const store = new FileModelStore(path);

        store.save('{"version":1}');

        expect(readFileSync(path, 'utf-8')).toBe('{"version":1}');
        expect(store.load()).toBe('{"version":1}');
    });

    it('rethrows read errors other than a missing file', () => {
        mkdirSync(join(dir, 'model.json'));
        expect(() => new FileModelStore(join(dir, 'model.json')).load()).toThrow();
    });

    it('lets a categorizer reload the model it persisted', () => {
        const path = join(dir, 'model.json');
        const examples = [
            { description: 'pizza delivery', category: 'Food & Dining' as const },
            { description: 'bus ticket', category: 'Transportation' as const },
        ];

        const first = new Categorizer({ store: new FileModelStore(path), examples });
        expect(first.initialize().source).toBe('trained');

        const second = new Categorizer({ store: new FileModelStore(path), examples });
        expect(second.initialize()).toEqual({ source: 'loaded', warnings: [] });
    });

    it('retrains over a corrupt model file', () => {
        const path = join(dir, 'model.json');
        const store = new FileModelStore(path);
        store.save('not json');

        const categorizer = new Categorizer({
            store,
            examples: [{ description: 'pizza delivery', category: 'Food & Dining' }],
        });
        const init = categorizer.initialize();

        expect(init.source).toBe('trained');
        expect(init.warnings).toHaveLength(1);
        expect(init.warnings[0]).toMatch(/^Saved categorizer model is unusable: not valid JSON/);
        expect(store.load()).not.toBe('not json');
    });
});
