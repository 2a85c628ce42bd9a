/**
 * Text normalization for categorization and label matching.
 */

/**
 * Normalize an expense description before it reaches the categorizer.
 *
 * Transformations:
 * - Convert to lowercase
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 *
 * @param raw - Description as typed by the user
 * @returns Normalized description
 */
export function normalizeDescription(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Comparison key for user-typed labels (categories, payment methods).
 * "  food &  DINING " and "Food & Dining" share a key.
 */
export function labelKey(raw: string): string {
    return normalizeDescription(raw);
}
