/**
 * Tokenization for the categorizer.
 */

import { CATEGORIZER } from '../types/index.js';

// Runs of letters, digits or underscore; length filter applied below.
const WORD = /[\p{L}\p{N}_]+/gu;

/**
 * Split text into lowercase word tokens of at least two characters,
 * dropping stop words. Punctuation separates tokens: "home-depot" yields
 * "home" and "depot".
 */
export function tokenize(text: string, stopWords: ReadonlySet<string>): string[] {
    const words = text.toLowerCase().match(WORD) ?? [];
    return words.filter((w) => w.length >= CATEGORIZER.MIN_TOKEN_LENGTH && !stopWords.has(w));
}
