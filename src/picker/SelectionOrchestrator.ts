/**
 * @file Selection orchestrator
 *
 * Sequences the resolution strategies into one outcome:
 *
 *   INIT ──empty catalog──────────────────────────────▶ EMPTY
 *   INIT ──query──▶ AUTO ──exact id / single match────▶ RESOLVED
 *   INIT / AUTO ──▶ EXTERNAL ──picked─────────────────▶ RESOLVED
 *                            ──dismissed / aborted────▶ CANCELLED
 *                            ──unknown identifier─────▶ VIOLATION
 *                            ──not available──▶ MANUAL ──▶ RESOLVED | CANCELLED
 *
 * The line reader is opened only when MANUAL is reached, so an external
 * finder never competes with readline for the terminal.
 *
 * @module
 */

import type {
    Catalog,
    CatalogEntry,
    FinderOutcome,
    FinderStrategy,
    LineReader,
    PromptOutcome,
    SelectionOutcome,
    SelectionState,
} from './types.js';
import { catalog_filter } from './FuzzyScorer.js';
import { PromptLoop } from './PromptLoop.js';
import type { Presenter } from '../ui/Presenter.js';

export const INTERRUPT_EXIT_CODE: number = 130;

export interface SelectionOptions {
    finder: FinderStrategy;
    reader_open: () => LineReader;
    presenter: Presenter;
    /** Exit code carried by an interrupted manual selection. */
    interruptExitCode?: number;
    /** Noun used in prompt notices. */
    noun?: string;
}

export class SelectionOrchestrator {
    private readonly options: SelectionOptions;
    private state: SelectionState = 'INIT';

    constructor(options: SelectionOptions) {
        this.options = options;
    }

    /**
     * Resolve one entry of `catalog`, optionally starting from `query`.
     */
    public async selection_resolve(catalog: Catalog, query: string = ''): Promise<SelectionOutcome> {
        this.state = 'INIT';
        const initialQuery: string = query.trim();

        if (catalog.length === 0) {
            this.state_enter('EMPTY');
            return { status: 'empty' };
        }

        if (initialQuery) {
            this.state_enter('AUTO');
            const auto: CatalogEntry | null = autoEntry_resolve(initialQuery, catalog);
            if (auto) {
                this.state_enter('RESOLVED');
                return { status: 'resolved', entry: auto, via: 'auto' };
            }
        }

        this.state_enter('EXTERNAL');
        const delegated: FinderOutcome | null = this.options.finder.finder_tryDelegate(catalog, initialQuery);
        if (delegated) {
            switch (delegated.kind) {
                case 'resolved':
                    this.state_enter('RESOLVED');
                    return { status: 'resolved', entry: delegated.entry, via: 'finder' };
                case 'cancelled':
                    this.state_enter('CANCELLED');
                    return { status: 'cancelled', exitCode: delegated.exitCode, reason: 'finder' };
                case 'violation':
                    this.state_enter('VIOLATION');
                    this.options.presenter.debug('Selection', `finder returned unknown output: ${JSON.stringify(delegated.output)}`);
                    return { status: 'violation', output: delegated.output };
            }
        }

        this.state_enter('MANUAL');
        const reader: LineReader = this.options.reader_open();
        let prompted: PromptOutcome;
        try {
            const loop: PromptLoop = new PromptLoop({
                catalog,
                reader,
                presenter: this.options.presenter,
                initialQuery,
                noun: this.options.noun,
            });
            prompted = await loop.run();
        } finally {
            reader.close();
        }

        if (prompted.kind === 'resolved') {
            this.state_enter('RESOLVED');
            return { status: 'resolved', entry: prompted.entry, via: 'manual' };
        }
        this.state_enter('CANCELLED');
        return {
            status: 'cancelled',
            exitCode: this.options.interruptExitCode ?? INTERRUPT_EXIT_CODE,
            reason: 'interrupted',
        };
    }

    /**
     * State reached by the last (or current) session.
     */
    public state_get(): SelectionState {
        return this.state;
    }

    private state_enter(next: SelectionState): void {
        this.options.presenter.debug('Selection', `${this.state} -> ${next}`);
        this.state = next;
    }
}

/**
 * Short-circuit resolution for a supplied query: an exact identifier wins,
 * then a query that leaves exactly one candidate.
 */
export function autoEntry_resolve(query: string, catalog: Catalog): CatalogEntry | null {
    const exact: CatalogEntry | undefined = catalog.find((e: CatalogEntry): boolean => e.identifier === query);
    if (exact) return exact;

    const matches: CatalogEntry[] = catalog_filter(query, catalog);
    return matches.length === 1 ? matches[0] : null;
}
