/**
 * @file Picker session wiring
 *
 * Shared by both front-ends: turns settings into an orchestrator and maps a
 * selection outcome onto the front-end's exit-code convention.
 *
 * @module
 */

import type { ChalkInstance } from 'chalk';
import type { PickerSettings, EnvMap } from '../config/settings.js';
import { SettingsService } from '../config/settings.js';
import { ExternalFinder } from '../picker/FinderAdapter.js';
import { ReadlineLineReader } from '../picker/LineReader.js';
import { SelectionOrchestrator } from '../picker/SelectionOrchestrator.js';
import type { CatalogEntry, FinderStrategy, LineReader, SelectionOutcome } from '../picker/types.js';
import { Presenter, type TerminalSink } from '../ui/Presenter.js';

export const VERSION: string = '0.1.0';

/** Exit code for an empty catalog or bad usage. */
export const EXIT_USAGE: number = 2;

/** Exit code for a finder that answered with an unknown identifier. */
export const EXIT_FAILURE: number = 1;

/**
 * Seams a front-end accepts; everything defaults to the real process.
 */
export interface CliDeps {
    cwd?: string;
    env?: EnvMap;
    sink?: TerminalSink;
    colors?: ChalkInstance;
    finder?: FinderStrategy;
    reader_open?: () => LineReader;
}

export interface Nouns {
    singular: string;
    plural: string;
}

export interface PickerSession {
    settings: PickerSettings;
    presenter: Presenter;
    orchestrator: SelectionOrchestrator;
}

/**
 * Load settings for `root` and assemble the selection pipeline.
 */
export function pickerSession_create(root: string, deps: CliDeps, header: string, nouns: Nouns): PickerSession {
    const env: EnvMap = deps.env ?? process.env;
    const settings: PickerSettings = SettingsService.load({ root, env }).snapshot();
    const presenter: Presenter = new Presenter({ sink: deps.sink, colors: deps.colors, debug: settings.debug });

    const finder: FinderStrategy = deps.finder ?? new ExternalFinder({
        command: settings.finderCommand,
        enabled: settings.finderEnabled,
        height: settings.finderHeight,
        timeoutMs: settings.finderTimeoutMs,
        header,
        env,
    });

    const orchestrator: SelectionOrchestrator = new SelectionOrchestrator({
        finder,
        reader_open: deps.reader_open ?? ((): LineReader => new ReadlineLineReader()),
        presenter,
        interruptExitCode: settings.interruptExitCode,
        noun: nouns.plural,
    });

    return { settings, presenter, orchestrator };
}

export interface OutcomeEntry {
    kind: 'entry';
    entry: CatalogEntry;
}

export interface OutcomeExit {
    kind: 'exit';
    exitCode: number;
}

export type OutcomeDecision = OutcomeEntry | OutcomeExit;

/**
 * Report a non-resolved outcome and choose the exit code, or hand back the
 * resolved entry.
 */
export function outcome_decide(outcome: SelectionOutcome, presenter: Presenter, nouns: Nouns): OutcomeDecision {
    switch (outcome.status) {
        case 'resolved':
            presenter.debug('Selection', `resolved '${outcome.entry.identifier}' via ${outcome.via}`);
            return { kind: 'entry', entry: outcome.entry };
        case 'empty':
            presenter.error(`No ${nouns.plural} found.`);
            return { kind: 'exit', exitCode: EXIT_USAGE };
        case 'cancelled':
            presenter.notice(`No ${nouns.singular} selected.`);
            return { kind: 'exit', exitCode: outcome.exitCode };
        case 'violation':
            presenter.error(`Finder returned an unknown ${nouns.singular}: ${outcome.output}`);
            return { kind: 'exit', exitCode: EXIT_FAILURE };
    }
}
