/**
 * @file In-process stand-ins for terminal, finder and line input, shared
 * by the test suites.
 *
 * @module
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type {
    Catalog,
    CatalogEntry,
    FinderOutcome,
    FinderStrategy,
    LineReader,
    LineReadResult,
} from '../picker/types.js';
import { Presenter, type TerminalSink } from '../ui/Presenter.js';

/** Colour instance that emits plain text. */
export const plainColors: ChalkInstance = new Chalk({ level: 0 });

export interface CaptureSink extends TerminalSink {
    outLines: string[];
    errLines: string[];
}

export function captureSink_create(): CaptureSink {
    const outLines: string[] = [];
    const errLines: string[] = [];
    return {
        outLines,
        errLines,
        out(line: string): void {
            outLines.push(line);
        },
        err(line: string): void {
            errLines.push(line);
        },
    };
}

export function plainPresenter_create(sink: TerminalSink, debug: boolean = false): Presenter {
    return new Presenter({ sink, colors: plainColors, debug });
}

/**
 * Line reader fed from a script. `null`, or running out of lines, reads as
 * an interrupt.
 */
export class ScriptedReader implements LineReader {
    public readonly prompts: string[] = [];
    public closed: boolean = false;
    private readonly lines: Array<string | null>;

    constructor(lines: Array<string | null>) {
        this.lines = [...lines];
    }

    public line_read(prompt: string): Promise<LineReadResult> {
        this.prompts.push(prompt);
        const next: string | null | undefined = this.lines.shift();
        if (next === undefined || next === null) {
            return Promise.resolve({ kind: 'interrupted' });
        }
        return Promise.resolve({ kind: 'line', text: next });
    }

    public close(): void {
        this.closed = true;
    }
}

/**
 * Finder returning a fixed outcome and recording its calls.
 */
export class StubFinder implements FinderStrategy {
    public readonly calls: Array<{ catalog: Catalog; query: string }> = [];
    private readonly outcome: FinderOutcome | null;

    constructor(outcome: FinderOutcome | null) {
        this.outcome = outcome;
    }

    public finder_tryDelegate(catalog: Catalog, query: string): FinderOutcome | null {
        this.calls.push({ catalog, query });
        return this.outcome;
    }
}

/**
 * Catalog from `[identifier, secondaryLabel]` pairs.
 */
export function catalog_make(pairs: Array<[string, string]>): Catalog {
    return pairs.map(([identifier, secondaryLabel]: [string, string]): CatalogEntry => ({
        identifier,
        primaryLabel: identifier,
        secondaryLabel,
    }));
}

/**
 * Identifiers of a list of entries.
 */
export function ids_of(entries: readonly CatalogEntry[]): string[] {
    return entries.map((e: CatalogEntry): string => e.identifier);
}
