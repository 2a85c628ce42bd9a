import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import {
    SettingsSchema,
    TrainingSetSchema,
    StopWordsSchema,
    DEFAULT_SETTINGS,
    type Settings,
    type TrainingExample,
} from '@pocket-ledger/shared';
import { getSettingsPath } from './paths.js';

/**
 * Loads config/settings.yaml. Missing keys take their defaults;
 * an empty file means all defaults.
 */
export function loadSettings(root: string): Settings {
    const path = getSettingsPath(root);
    if (!existsSync(path)) {
        throw new Error(`Settings file not found: ${path}`);
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    const parsed = SettingsSchema.safeParse(data ?? {});
    if (!parsed.success) {
        throw new Error(`Invalid settings in ${path}: ${formatIssues(parsed.error.issues)}`);
    }
    return parsed.data;
}

/**
 * Writes a settings file holding the defaults, unless one exists.
 *
 * @returns true when a file was written
 */
export function writeDefaultSettings(root: string): boolean {
    const path = getSettingsPath(root);
    if (existsSync(path)) return false;
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, stringify({ ...DEFAULT_SETTINGS }), 'utf-8');
    return true;
}

/**
 * Loads the labelled examples the categorizer trains on.
 */
export function loadTrainingExamples(path: string): TrainingExample[] {
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    const parsed = TrainingSetSchema.safeParse(data);
    if (!parsed.success) {
        throw new Error(`Invalid training examples in ${path}: ${formatIssues(parsed.error.issues)}`);
    }
    return parsed.data.examples;
}

export function loadStopWords(path: string): string[] {
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = StopWordsSchema.safeParse(data);
    if (!parsed.success) {
        throw new Error(`Invalid stop word list in ${path}: ${formatIssues(parsed.error.issues)}`);
    }
    return parsed.data;
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
