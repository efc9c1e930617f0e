/**
 * @file Text normalization for fuzzy comparison.
 *
 * @module
 */

/**
 * Canonicalize a string for matching: decompose to base glyphs, drop
 * everything outside ASCII (combining marks included), lowercase.
 *
 * `'Crème Brûlée'` → `'creme brulee'`. A string made only of non-ASCII
 * glyphs without an ASCII base normalizes to `''`.
 */
export function text_normalize(value: string): string {
    return value
        .normalize('NFKD')
        .replace(/[^\x00-\x7F]/g, '')
        .toLowerCase();
}
