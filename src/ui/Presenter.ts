/**
 * @file Terminal Presenter
 *
 * Visual language of the pickers: markers, colours and entry listings.
 * Every line goes through a `TerminalSink`, so tests can capture output
 * and the orchestrator never touches the process streams directly.
 *
 * Listings are written to stdout; notices, errors and debug traces to
 * stderr, keeping stdout clean when a picker is used in a pipe.
 *
 * @module ui/presenter
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { CatalogEntry } from '../picker/types.js';

/**
 * Standard markers of the picker's visual dialect.
 */
export const MARKERS = {
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
    HINT: '»',
    RUN: '→',
} as const;

/**
 * Destination for rendered lines. Each call writes one line.
 */
export interface TerminalSink {
    out(line: string): void;
    err(line: string): void;
}

export const processSink: TerminalSink = {
    out(line: string): void {
        process.stdout.write(`${line}\n`);
    },
    err(line: string): void {
        process.stderr.write(`${line}\n`);
    },
};

export interface PresenterOptions {
    sink?: TerminalSink;
    /** Colour instance; pass `new Chalk({ level: 0 })` for plain text. */
    colors?: ChalkInstance;
    debug?: boolean;
}

/**
 * Plain `primary  (secondary)` label of an entry.
 */
export function entry_format(entry: CatalogEntry): string {
    return entry.secondaryLabel ? `${entry.primaryLabel}  (${entry.secondaryLabel})` : entry.primaryLabel;
}

export class Presenter {
    private readonly sink: TerminalSink;
    private readonly colors: ChalkInstance;
    private readonly debugEnabled: boolean;

    constructor(options: PresenterOptions = {}) {
        this.sink = options.sink ?? processSink;
        this.colors = options.colors ?? chalk;
        this.debugEnabled = options.debug ?? false;
    }

    /**
     * One numbered line of a selection listing.
     */
    public entryLine_format(index: number, entry: CatalogEntry): string {
        const label: string = this.colors.cyan(entry.primaryLabel);
        const detail: string = entry.secondaryLabel ? `  ${this.colors.gray(`(${entry.secondaryLabel})`)}` : '';
        return `${this.colors.yellow(`${index}.`)} ${label}${detail}`;
    }

    /**
     * Print numbered entries, starting at 1.
     */
    public entries_print(entries: readonly CatalogEntry[]): void {
        entries.forEach((entry: CatalogEntry, i: number): void => {
            this.sink.out(this.entryLine_format(i + 1, entry));
        });
    }

    /**
     * Print every entry without numbering (`--list`).
     */
    public listing_print(entries: readonly CatalogEntry[]): void {
        for (const entry of entries) {
            this.sink.out(entry_format(entry));
        }
    }

    public line(text: string): void {
        this.sink.out(text);
    }

    public notice(message: string): void {
        this.sink.err(this.colors.white(`${MARKERS.INFO} ${message}`));
    }

    public warning(message: string): void {
        this.sink.err(this.colors.yellow(`${MARKERS.WARNING} ${message}`));
    }

    public error(message: string): void {
        this.sink.err(this.colors.red(`${MARKERS.ERROR} ${message}`));
    }

    public hint(message: string): void {
        this.sink.err(this.colors.gray(`${MARKERS.HINT} ${message}`));
    }

    /**
     * Announce a subprocess about to run.
     */
    public run_announce(description: string): void {
        this.sink.out(this.colors.green(`${MARKERS.RUN} Running ${description}`));
    }

    /**
     * Scoped diagnostic line, shown only when debugging is on.
     */
    public debug(scope: string, message: string): void {
        if (!this.debugEnabled) return;
        this.sink.err(this.colors.gray(`[${scope}] ${message}`));
    }
}
