import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ModelStore } from '@pocket-ledger/core';

/**
 * Keeps the serialized categorizer model in a JSON file.
 * A missing file reads as "nothing saved yet".
 */
export class FileModelStore implements ModelStore {
    constructor(readonly path: string) {}

    load(): string | null {
        try {
            return readFileSync(this.path, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) return null;
            throw err;
        }
    }

    save(serialized: string): void {
        mkdirSync(dirname(this.path), { recursive: true });
        writeFileSync(this.path, serialized, 'utf-8');
    }
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
