/**
 * @file Command registry
 *
 * Explicit registration of `flow` subcommands. A registry is filled before
 * the picker runs and frozen into a catalog ordered case-insensitively by
 * name; nothing is registered at module load time.
 *
 * Usage:
 *   const registry = new CommandRegistry().command_register({
 *       name: 'ping',
 *       help: 'Ping something',
 *       usage: '<target>',
 *       handler: (args) => { console.log(`Pinging ${args[0]}...`); return 0; },
 *   });
 *
 * @module
 */

import type { Catalog } from '../picker/types.js';
import { CatalogBuilder } from './CatalogBuilder.js';

/**
 * Context handed to a command handler.
 */
export interface CommandContext {
    /** Writes one line to stdout. */
    print: (line: string) => void;
}

/**
 * A handler's return value is its exit code; nothing means 0.
 */
export type CommandHandler = (args: string[], context: CommandContext) => number | void | Promise<number | void>;

export interface CommandSpec {
    name: string;
    help: string;
    /** Argument synopsis shown by `--help`, e.g. `[name]`. */
    usage?: string;
    handler: CommandHandler;
}

export class CommandRegistry {
    private readonly builder: CatalogBuilder = new CatalogBuilder();
    private readonly specs: Map<string, CommandSpec> = new Map<string, CommandSpec>();

    /**
     * Register one command.
     *
     * @throws DuplicateEntryError when the name is taken.
     * @throws InvalidEntryError when the name is empty or multi-line.
     */
    public command_register(spec: CommandSpec): this {
        this.builder.entry_add({ identifier: spec.name, primaryLabel: spec.name, secondaryLabel: spec.help });
        this.specs.set(spec.name, spec);
        return this;
    }

    public command_get(name: string): CommandSpec | undefined {
        return this.specs.get(name);
    }

    /**
     * Registered commands as a catalog, ordered case-insensitively by name.
     */
    public catalog_build(): Catalog {
        return this.builder.catalog_build('identifier-ci');
    }

    /**
     * Run a command's handler and normalize its exit code.
     */
    public async command_run(name: string, args: string[], context: CommandContext): Promise<number> {
        const spec: CommandSpec | undefined = this.specs.get(name);
        if (!spec) {
            throw new Error(`Unknown command: ${name}`);
        }
        const result: number | void = await spec.handler(args, context);
        return typeof result === 'number' ? result : 0;
    }
}

// ─── Built-in commands ───────────────────────────────────────────────────────

export const helloCommand: CommandSpec = {
    name: 'hello',
    help: 'Say hello to someone.',
    usage: '[name]',
    handler: (args: string[], context: CommandContext): number => {
        const name: string = args.length > 0 ? args[0] : 'world';
        context.print(`Hello, ${name}!`);
        return 0;
    },
};

/**
 * Registry holding every built-in `flow` command.
 */
export function defaultRegistry_create(): CommandRegistry {
    return new CommandRegistry().command_register(helloCommand);
}
