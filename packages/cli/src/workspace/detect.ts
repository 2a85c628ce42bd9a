import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const SETTINGS_RELATIVE_PATH = join('config', 'settings.yaml');

/**
 * Searches for the workspace root by looking for 'config/settings.yaml'.
 * Starts at startPath and bubbles up to the filesystem root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        if (existsSync(join(current, SETTINGS_RELATIVE_PATH))) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
