import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Categorizer, MemoryModelStore } from '@pocket-ledger/core';
import { loadSettings, writeDefaultSettings, loadTrainingExamples, loadStopWords } from '../src/workspace/config.js';
import { resolveAssetPaths } from '../src/workspace/paths.js';

describe('settings', () => {
    let root: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'pledger-config-'));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    function writeSettings(content: string): void {
        mkdirSync(join(root, 'config'), { recursive: true });
        writeFileSync(join(root, 'config', 'settings.yaml'), content, 'utf-8');
    }

    it('throws when the settings file is missing', () => {
        expect(() => loadSettings(root)).toThrow(/^Settings file not found: /);
    });

    it('treats an empty file as all defaults', () => {
        writeSettings('');
        expect(loadSettings(root)).toEqual({
            database: 'data/ledger.db',
            model: 'data/categorizer-model.json',
            exports: 'exports',
            default_range_days: 30,
        });
    });

    it('fills in missing keys', () => {
        writeSettings('default_range_days: 7\nexports: out\n');
        const settings = loadSettings(root);
        expect(settings.default_range_days).toBe(7);
        expect(settings.exports).toBe('out');
        expect(settings.database).toBe('data/ledger.db');
    });

    it('rejects invalid values with the offending key', () => {
        writeSettings('default_range_days: -3\n');
        expect(() => loadSettings(root)).toThrow(/default_range_days: /);
    });

    it('writes defaults once and never overwrites', () => {
        expect(writeDefaultSettings(root)).toBe(true);
        expect(loadSettings(root).database).toBe('data/ledger.db');

        writeSettings('database: mine.db\n');
        expect(writeDefaultSettings(root)).toBe(false);
        expect(readFileSync(join(root, 'config', 'settings.yaml'), 'utf-8')).toBe('database: mine.db\n');
    });
});

describe('bundled categorizer assets', () => {
    const assets = resolveAssetPaths();

    it('loads the 28 training examples', () => {
        const examples = loadTrainingExamples(assets.trainingExamplesPath);
        expect(examples).toHaveLength(28);
        expect(examples[0]).toEqual({ description: 'pizza delivery', category: 'Food & Dining' });
    });

    it('covers every category except the fallback', () => {
        const categories = new Set(loadTrainingExamples(assets.trainingExamplesPath).map((e) => e.category));
        expect(categories.size).toBe(10);
        expect(categories.has('Miscellaneous')).toBe(false);
    });

    it('loads the English stop word list', () => {
        const stopWords = loadStopWords(assets.stopWordsPath);
        expect(stopWords).toHaveLength(318);
        expect(stopWords).toContain('the');
        expect(stopWords).toContain('bill');
    });

    it('categorizes with the bundled model', () => {
        const categorizer = new Categorizer({
            store: new MemoryModelStore(),
            examples: loadTrainingExamples(assets.trainingExamplesPath),
            stopWords: loadStopWords(assets.stopWordsPath),
        });

        expect(categorizer.categorize('pizza delivery')).toBe('Food & Dining');
        expect(categorizer.categorize('uber ride')).toBe('Transportation');
        expect(categorizer.categorize('random gibberish')).toBe('Miscellaneous');
    });
});

describe('asset validation', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'pledger-assets-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('rejects training examples with unknown categories', () => {
        const path = join(dir, 'examples.yaml');
        writeFileSync(path, 'examples:\n  - description: yoga class\n    category: Fitness\n', 'utf-8');
        expect(() => loadTrainingExamples(path)).toThrow(/^Invalid training examples in .*examples\.0\.category: /);
    });

    it('rejects a stop word list that is not an array of words', () => {
        const path = join(dir, 'stop.json');
        writeFileSync(path, '{"words": []}', 'utf-8');
        expect(() => loadStopWords(path)).toThrow(/^Invalid stop word list in /);
    });
});
