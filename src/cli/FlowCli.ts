/**
 * @file flow: command dispatcher front-end
 *
 * Runs a registered subcommand. An exact command name runs directly with the
 * rest of the command line as its arguments; anything else is a query for
 * the picker, and arguments after `--` go to the chosen command.
 *
 * @module
 */

import type { Catalog, CatalogEntry } from '../picker/types.js';
import { CommandRegistry, defaultRegistry_create, type CommandContext, type CommandSpec } from '../catalog/commands.js';
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

const NOUNS: Nouns = { singular: 'command', plural: 'commands' };

const FINDER_HEADER: string = 'flow: pick a command to run';

/**
 * Usage text listing every registered command.
 */
export function flowUsage_format(registry: CommandRegistry): string {
    const catalog: Catalog = registry.catalog_build();
    const width: number = Math.max(0, ...catalog.map((e: CatalogEntry): number => e.identifier.length));
    const rows: string[] = catalog.map((entry: CatalogEntry): string => {
        const spec: CommandSpec | undefined = registry.command_get(entry.identifier);
        const synopsis: string = spec?.usage ? `${entry.identifier} ${spec.usage}` : entry.identifier;
        return `  ${synopsis.padEnd(width + 10)}${entry.secondaryLabel}`;
    });
    return [
        'Usage: flow [--list] [query...] [-- args...]',
        '       flow <command> [args...]',
        '',
        'A place to vibe new commands into.',
        '',
        'Commands:',
        ...rows,
    ].join('\n');
}

/**
 * Run the `flow` front-end.
 *
 * @returns Process exit code.
 */
export async function flow_run(
    argv: readonly string[],
    deps: CliDeps = {},
    registry: CommandRegistry = defaultRegistry_create()
): Promise<number> {
    const args: PickerArgs = pickerArgs_parse(argv);
    const bootPresenter: Presenter = new Presenter({ sink: deps.sink, colors: deps.colors });

    if (args.errors.length > 0) {
        args.errors.forEach((message: string): void => bootPresenter.error(message));
        bootPresenter.hint('Run "flow --help" for usage.');
        return EXIT_USAGE;
    }
    if (args.help) {
        bootPresenter.line(flowUsage_format(registry));
        return 0;
    }
    if (args.version) {
        bootPresenter.line(VERSION);
        return 0;
    }

    const root: string = args.root ?? deps.cwd ?? process.cwd();
    const session: PickerSession = pickerSession_create(root, deps, FINDER_HEADER, NOUNS);
    const catalog: Catalog = registry.catalog_build();
    const context: CommandContext = { print: (line: string): void => session.presenter.line(line) };

    if (args.list) {
        session.presenter.listing_print(catalog);
        return 0;
    }

    const [first, ...rest] = args.query;
    if (first !== undefined && registry.command_get(first)) {
        return registry.command_run(first, [...rest, ...args.passthrough], context);
    }

    const decision: OutcomeDecision = outcome_decide(
        await session.orchestrator.selection_resolve(catalog, query_join(args.query)),
        session.presenter,
        NOUNS
    );
    if (decision.kind === 'exit') {
        return decision.exitCode;
    }
    return registry.command_run(decision.entry.identifier, [...args.passthrough], context);
}
