/**
 * In-memory ModelStore, for tests and for callers that never persist.
 */

import type { ModelStore } from './types.js';

export class MemoryModelStore implements ModelStore {
    private data: string | null;
    saveCount = 0;

    constructor(initial: string | null = null) {
        this.data = initial;
    }

    load(): string | null {
        return this.data;
    }

    save(serialized: string): void {
        this.data = serialized;
        this.saveCount++;
    }
}
