/**
 * @file scripts: script runner front-end
 *
 * Fuzzy-picks a script from the project's scripts directory and runs it with
 * the current Node executable. Query words pre-filter the scripts; arguments
 * after `--` are passed to the script.
 *
 * @module
 */

import path from 'path';
import type { Catalog } from '../picker/types.js';
import {
    scriptCatalog_build,
    scriptRun_describe,
    script_execute,
    scripts_scan,
    type ScriptEntry,
} from '../catalog/scripts.js';
import { pickerArgs_parse, query_join, type PickerArgs } from './args.js';
import {
    EXIT_USAGE,
    VERSION,
    outcome_decide,
    pickerSession_create,
    type CliDeps,
    type Nouns,
    type OutcomeDecision,
    type PickerSession,
} from './session.js';
import { Presenter } from '../ui/Presenter.js';

const NOUNS: Nouns = { singular: 'script', plural: 'scripts' };

const FINDER_HEADER: string = 'scripts: pick a script to run';

export const SCRIPTS_USAGE: string = [
    'Usage: scripts [--list] [--root <dir>] [query...] [-- args...]',
    '',
    'Fuzzy pick and run scripts from the scripts/ directory.',
    '',
    'Options:',
    '  --list, -l      List available scripts and exit',
    '  --root <dir>    Project root (default: current directory)',
    '  --help, -h      Show this help',
    '  --version, -V   Show the version',
].join('\n');

/**
 * Runs the resolved script; replaced in tests.
 */
export type ScriptExecutor = (script: ScriptEntry, args: readonly string[], root: string) => number;

/**
 * Run the `scripts` front-end.
 *
 * @returns Process exit code; the script's own when one ran.
 */
export async function scripts_run(
    argv: readonly string[],
    deps: CliDeps = {},
    execute: ScriptExecutor = script_execute
): Promise<number> {
    const args: PickerArgs = pickerArgs_parse(argv);
    const bootPresenter: Presenter = new Presenter({ sink: deps.sink, colors: deps.colors });

    if (args.errors.length > 0) {
        args.errors.forEach((message: string): void => bootPresenter.error(message));
        bootPresenter.hint('Run "scripts --help" for usage.');
        return EXIT_USAGE;
    }
    if (args.help) {
        bootPresenter.line(SCRIPTS_USAGE);
        return 0;
    }
    if (args.version) {
        bootPresenter.line(VERSION);
        return 0;
    }

    const root: string = path.resolve(deps.cwd ?? process.cwd(), args.root ?? '.');
    const session: PickerSession = pickerSession_create(root, deps, FINDER_HEADER, NOUNS);
    const scripts: ScriptEntry[] = scripts_scan({
        root,
        scriptsDir: session.settings.scriptsDir,
        excludePrefixes: session.settings.excludePrefixes,
    });
    const catalog: Catalog = scriptCatalog_build(scripts);

    if (args.list) {
        if (catalog.length === 0) {
            session.presenter.error(`No scripts found in the ${session.settings.scriptsDir}/ directory.`);
            return EXIT_USAGE;
        }
        session.presenter.listing_print(catalog);
        return 0;
    }

    const decision: OutcomeDecision = outcome_decide(
        await session.orchestrator.selection_resolve(catalog, query_join(args.query)),
        session.presenter,
        NOUNS
    );
    if (decision.kind === 'exit') {
        return decision.exitCode;
    }

    const identifier: string = decision.entry.identifier;
    const script: ScriptEntry | undefined = scripts.find((s: ScriptEntry): boolean => s.name === identifier);
    if (!script) {
        throw new Error(`Resolved script missing from scan: ${identifier}`);
    }
    session.presenter.run_announce(scriptRun_describe(script, args.passthrough));
    return execute(script, args.passthrough, root);
}
