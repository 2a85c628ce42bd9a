/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

/**
 * Prints the error and exits with status 1.
 */
export function fail(message: string): never {
    console.error(`\n✖ Error: ${message}`);
    process.exit(1);
}

/**
 * Renders rows as fixed-width columns. Cells listed in `rightAlign` are padded on the left.
 */
export function formatTable(
    headers: string[],
    rows: string[][],
    rightAlign: ReadonlySet<number> = new Set()
): string[] {
    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
    const render = (cells: string[]) =>
        cells
            .map((cell, i) => (rightAlign.has(i) ? cell.padStart(widths[i]) : cell.padEnd(widths[i])))
            .join('  ')
            .trimEnd();

    return [render(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(render)];
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
