/**
 * Error types surfaced by core and by store implementations.
 *
 * Categorizer failures have no error type: they are absorbed and
 * reported as warnings.
 */

/**
 * Caller-side input problem. Carries every issue found, not just the first.
 */
export class ValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(issues.length === 1 ? issues[0] : `Invalid input:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

/**
 * Backing store unreachable, or a read/write that could not complete.
 * The failed call had no effect.
 */
export class StorageError extends Error {
    readonly operation: string;

    constructor(operation: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Storage failure during ${operation}: ${reason}`, { cause });
        this.name = 'StorageError';
        this.operation = operation;
    }
}
