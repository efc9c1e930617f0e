import { describe, expect, it } from 'vitest';
import {
    catalog_filter,
    catalog_match,
    entry_fields,
    entry_score,
    span_find,
    span_locate,
} from './FuzzyScorer.js';
import { text_normalize } from './normalize.js';
import { catalog_make, ids_of } from '../testing/fakes.js';
import type { Catalog, CatalogEntry, MatchResult } from './types.js';

const SAMPLE: Catalog = catalog_make([
    ['hello', 'Say hello'],
    ['build', 'Build project'],
    ['bundle', 'Bundle assets'],
]);

describe('text_normalize', (): void => {
    it('strips diacritics and lowercases', (): void => {
        expect(text_normalize('Crème Brûlée')).toBe('creme brulee');
    });

    it('folds compatibility forms to ASCII', (): void => {
        expect(text_normalize('ﬁle')).toBe('file');
    });

    it('returns an empty string when nothing ASCII remains', (): void => {
        expect(text_normalize('日本')).toBe('');
    });
});

describe('span_locate', (): void => {
    it('measures a spread-out subsequence', (): void => {
        expect(span_locate('abc', 'xaxbxc')).toEqual({ length: 5, start: 1 });
    });

    it('finds the shortest span, not the leftmost one', (): void => {
        expect(span_locate('ab', 'axxab')).toEqual({ length: 2, start: 3 });
    });

    it('keeps the earliest start among equal lengths', (): void => {
        expect(span_locate('ab', 'abab')).toEqual({ length: 2, start: 0 });
    });

    it('rejects queries longer than the field', (): void => {
        expect(span_locate('abc', 'ab')).toBeNull();
    });

    it('rejects characters out of order', (): void => {
        expect(span_locate('ba', 'ab')).toBeNull();
    });
});

describe('span_find', (): void => {
    it('matches across diacritics', (): void => {
        expect(span_find('creme', 'Crème')).toEqual({ length: 5, start: 0 });
    });

    it('treats whitespace in the query literally', (): void => {
        expect(span_find('a b', 'a-b')).toBeNull();
        expect(span_find('a b', 'a xb')).toEqual({ length: 4, start: 0 });
    });
});

describe('entry_score', (): void => {
    const deploy: CatalogEntry = { identifier: 'deploy', primaryLabel: 'deploy', secondaryLabel: 'Push to prod' };

    it('searches identifier and labels once each', (): void => {
        expect(entry_fields(deploy)).toEqual(['deploy', 'Push to prod']);
        expect(entry_fields({ identifier: 'x', primaryLabel: 'Ex', secondaryLabel: '' })).toEqual(['x', 'Ex', '']);
    });

    it('keeps the best span across fields', (): void => {
        const match: MatchResult | null = entry_score('pd', deploy);
        expect(match).toEqual({ score: 4, startOffset: 8, entry: deploy });
    });

    it('returns null when no field matches', (): void => {
        expect(entry_score('zz', deploy)).toBeNull();
    });
});

describe('catalog_filter', (): void => {
    it('ranks single-letter matches and drops non-matches', (): void => {
        const matches: MatchResult[] = catalog_match('b', SAMPLE);
        expect(matches.map((m: MatchResult): [string, number, number] => [m.entry.identifier, m.score, m.startOffset]))
            .toEqual([['build', 1, 0], ['bundle', 1, 0]]);
    });

    it('requires every query character in order', (): void => {
        expect(ids_of(catalog_filter('bnd', SAMPLE))).toEqual(['bundle']);
    });

    it('returns the whole catalog in order for an empty query', (): void => {
        expect(ids_of(catalog_filter('', SAMPLE))).toEqual(['hello', 'build', 'bundle']);
        expect(ids_of(catalog_filter('日本', SAMPLE))).toEqual(['hello', 'build', 'bundle']);
    });

    it('breaks full ties by identifier', (): void => {
        const catalog: Catalog = catalog_make([['ya', ''], ['xa', '']]);
        expect(ids_of(catalog_filter('a', catalog))).toEqual(['xa', 'ya']);
    });

    it('prefers tighter spans over earlier ones', (): void => {
        const catalog: Catalog = catalog_make([['a-x-b', ''], ['zzab', '']]);
        expect(ids_of(catalog_filter('ab', catalog))).toEqual(['zzab', 'a-x-b']);
    });

    it('matches on the secondary label', (): void => {
        expect(ids_of(catalog_filter('assets', SAMPLE))).toEqual(['bundle']);
    });
});
