/**
 * @file Subsequence fuzzy scorer.
 *
 * A query matches a field when its characters appear in the field in order,
 * with any run of other characters between them. The score of a match is
 * the length of the shortest such span; shorter is better.
 *
 * Ranking is a total order over `(score, startOffset, identifier)`, so the
 * result never depends on the order the catalog was enumerated in.
 *
 * @module
 */

import type { Catalog, CatalogEntry, MatchResult } from './types.js';
import { text_normalize } from './normalize.js';

/**
 * Minimal span of a field containing the query as a subsequence.
 */
export interface MatchSpan {
    length: number;
    start: number;
}

/**
 * Find the shortest span of `haystack` holding `needle` as an in-order
 * subsequence. Both arguments must already be normalized.
 *
 * From every position where the first needle character occurs, the
 * earliest completion is found by a greedy forward scan; the greedy end is
 * the smallest end for that start, so the minimum over all starts is the
 * globally shortest span. Equal lengths keep the earliest start.
 */
export function span_locate(needle: string, haystack: string): MatchSpan | null {
    if (needle.length === 0) return { length: 0, start: 0 };
    if (needle.length > haystack.length) return null;

    let best: MatchSpan | null = null;
    const first: string = needle[0];

    for (let start = haystack.indexOf(first); start !== -1; start = haystack.indexOf(first, start + 1)) {
        let cursor: number = start;
        let matched: number = 0;
        while (cursor < haystack.length && matched < needle.length) {
            if (haystack[cursor] === needle[matched]) matched++;
            cursor++;
        }
        // No completion from here means none from any later start either.
        if (matched < needle.length) break;

        const length: number = cursor - start;
        if (!best || length < best.length) {
            best = { length, start };
            if (length === needle.length) break;
        }
    }

    return best;
}

/**
 * Normalize both sides and locate the minimal span of `query` in `field`.
 */
export function span_find(query: string, field: string): MatchSpan | null {
    return span_locate(text_normalize(query), text_normalize(field));
}

/**
 * Searchable text of an entry, in comparison order.
 */
export function entry_fields(entry: CatalogEntry): string[] {
    const fields: string[] = [entry.identifier];
    if (entry.primaryLabel !== entry.identifier) fields.push(entry.primaryLabel);
    fields.push(entry.secondaryLabel);
    return fields;
}

/**
 * Score one entry: best `(length, start)` pair across its fields.
 *
 * @returns The match, or null when no field holds the query.
 */
export function entry_score(query: string, entry: CatalogEntry): MatchResult | null {
    const needle: string = text_normalize(query);
    if (needle.length === 0) {
        return { score: 0, startOffset: 0, entry };
    }

    let best: MatchSpan | null = null;
    for (const field of entry_fields(entry)) {
        const span: MatchSpan | null = span_locate(needle, text_normalize(field));
        if (!span) continue;
        if (!best || span.length < best.length || (span.length === best.length && span.start < best.start)) {
            best = span;
        }
    }

    return best ? { score: best.length, startOffset: best.start, entry } : null;
}

/**
 * Total order used for ranking matches.
 */
export function match_compare(a: MatchResult, b: MatchResult): number {
    if (a.score !== b.score) return a.score - b.score;
    if (a.startOffset !== b.startOffset) return a.startOffset - b.startOffset;
    if (a.entry.identifier < b.entry.identifier) return -1;
    if (a.entry.identifier > b.entry.identifier) return 1;
    return 0;
}

/**
 * Score every entry of the catalog and rank the matches.
 *
 * An empty (or normalized-empty) query filters nothing: every entry comes
 * back with score 0, in catalog order.
 */
export function catalog_match(query: string, catalog: Catalog): MatchResult[] {
    if (text_normalize(query).length === 0) {
        return catalog.map((entry: CatalogEntry): MatchResult => ({ score: 0, startOffset: 0, entry }));
    }

    const matches: MatchResult[] = [];
    for (const entry of catalog) {
        const match: MatchResult | null = entry_score(query, entry);
        if (match) matches.push(match);
    }
    return matches.sort(match_compare);
}

/**
 * Filter the catalog by a query, ranked best first.
 */
export function catalog_filter(query: string, catalog: Catalog): CatalogEntry[] {
    return catalog_match(query, catalog).map((match: MatchResult): CatalogEntry => match.entry);
}
