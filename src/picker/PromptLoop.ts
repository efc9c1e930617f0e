/**
 * @file Manual prompt loop
 *
 * Line-oriented fallback picker used when no external finder is available.
 * Each round shows the first ten ranked candidates and reads one line:
 *
 *   (empty)      pick the only remaining candidate, otherwise ask again
 *   123          pick by 1-based index among the displayed candidates
 *   identifier   pick that entry from the whole catalog, filter or not
 *   anything     re-filter the whole catalog with it as the query
 *
 * A new query never narrows the previous result; it is scored against the
 * full catalog every time.
 *
 * @module
 */

import type { Catalog, CatalogEntry, LineReader, LineReadResult, PromptOutcome } from './types.js';
import { catalog_filter } from './FuzzyScorer.js';
import type { Presenter } from '../ui/Presenter.js';

export const DISPLAY_LIMIT: number = 10;

export const PROMPT_TEXT: string = 'Enter number to select, or type to filter (Ctrl+C to cancel): ';

export interface PromptLoopOptions {
    catalog: Catalog;
    reader: LineReader;
    presenter: Presenter;
    /** Starting filter; empty shows the whole catalog. */
    initialQuery?: string;
    /** Noun used in notices, e.g. `scripts`. */
    noun?: string;
}

export class PromptLoop {
    private readonly catalog: Catalog;
    private readonly reader: LineReader;
    private readonly presenter: Presenter;
    private readonly noun: string;
    private remaining: CatalogEntry[];

    constructor(options: PromptLoopOptions) {
        this.catalog = options.catalog;
        this.reader = options.reader;
        this.presenter = options.presenter;
        this.noun = options.noun ?? 'entries';
        this.remaining = options.initialQuery
            ? catalog_filter(options.initialQuery, options.catalog)
            : [...options.catalog];
    }

    /**
     * Candidates currently shown, at most `DISPLAY_LIMIT`.
     */
    public displayed_get(): CatalogEntry[] {
        return this.remaining.slice(0, DISPLAY_LIMIT);
    }

    /**
     * Full filtered list, including entries past the display limit.
     */
    public remaining_get(): CatalogEntry[] {
        return [...this.remaining];
    }

    /**
     * Prompt until an entry is picked or the user interrupts.
     */
    public async run(): Promise<PromptOutcome> {
        for (;;) {
            const displayed: CatalogEntry[] = this.displayed_get();
            if (displayed.length === 0) {
                this.presenter.notice(`No ${this.noun} matched. Try again.`);
            } else {
                this.presenter.entries_print(displayed);
            }

            const read: LineReadResult = await this.reader.line_read(PROMPT_TEXT);
            if (read.kind === 'interrupted') {
                return { kind: 'interrupted' };
            }

            const picked: CatalogEntry | null = this.input_apply(read.text.trim(), displayed);
            if (picked) {
                return { kind: 'resolved', entry: picked };
            }
        }
    }

    /**
     * Apply one line of input. Returns the picked entry, or null after
     * updating (or keeping) the filter.
     */
    private input_apply(input: string, displayed: CatalogEntry[]): CatalogEntry | null {
        if (input === '') {
            return this.remaining.length === 1 ? this.remaining[0] : null;
        }

        if (/^\d+$/.test(input)) {
            const choice: number = Number.parseInt(input, 10);
            if (choice >= 1 && choice <= displayed.length) {
                return displayed[choice - 1];
            }
            this.presenter.warning('Invalid selection. Try again.');
            return null;
        }

        const exact: CatalogEntry | undefined = this.catalog.find((e: CatalogEntry): boolean => e.identifier === input);
        if (exact) return exact;

        this.remaining = catalog_filter(input, this.catalog);
        return null;
    }
}
