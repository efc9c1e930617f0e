/**
 * @file External finder adapter
 *
 * Delegates selection to a user-installed interactive fuzzy finder (`fzf`
 * by default) over a line protocol:
 *
 *   stdin   one `identifier<TAB>secondaryLabel` line per entry, written in
 *           one buffer and closed
 *   stdout  the chosen line; its first tab field is the identifier
 *   status  0 = chosen or dismissed, non-zero = aborted
 *
 * The finder draws its interface on the terminal device, so both pipes are
 * fully buffered and the call blocks until the child exits.
 *
 * @module
 */

import { spawnSync, type SpawnSyncReturns } from 'child_process';
import fs from 'fs';
import { constants as osConstants } from 'os';
import path from 'path';
import type { Catalog, CatalogEntry, EnvMap, FinderOutcome, FinderStrategy } from './types.js';
import { FinderLaunchError } from './errors.js';

export interface FinderOptions {
    command: string;
    enabled: boolean;
    height: string;
    /** 0 waits indefinitely. */
    timeoutMs: number;
    header: string;
    /** Environment searched for `PATH`; defaults to the process environment. */
    env?: EnvMap;
}

const FINDER_MAX_BUFFER: number = 16 * 1024 * 1024;

// ─── Executable lookup ───────────────────────────────────────────────────────

function file_isExecutable(candidate: string): boolean {
    try {
        if (!fs.statSync(candidate).isFile()) return false;
        fs.accessSync(candidate, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Resolve a command name on `PATH` the way a shell would.
 *
 * A command containing a path separator is checked as given. On Windows
 * every `PATHEXT` extension is tried as well.
 *
 * @returns Absolute path of the executable, or null when not found.
 */
export function executable_resolve(command: string, env: EnvMap = process.env): string | null {
    if (!command) return null;

    if (command.includes('/') || command.includes(path.sep)) {
        const direct: string = path.resolve(command);
        return file_isExecutable(direct) ? direct : null;
    }

    const extensions: string[] = process.platform === 'win32'
        ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
        : [''];
    const dirs: string[] = (env.PATH ?? '').split(path.delimiter).filter(Boolean);

    for (const dir of dirs) {
        for (const ext of extensions) {
            const candidate: string = path.join(dir, `${command}${ext}`);
            if (file_isExecutable(candidate)) return candidate;
        }
    }
    return null;
}

// ─── Protocol ────────────────────────────────────────────────────────────────

/**
 * One protocol line for an entry.
 */
export function entry_serialize(entry: CatalogEntry): string {
    return `${entry.identifier}\t${entry.secondaryLabel}`;
}

/**
 * Finder command-line: fixed-height panel, reverse layout, single
 * selection, display limited to the two serialized fields.
 */
export function finderArgs_build(options: Pick<FinderOptions, 'height' | 'header'>, query: string): string[] {
    const args: string[] = [
        `--height=${options.height}`,
        '--reverse',
        '--no-multi',
        '--delimiter=\t',
        '--with-nth=1,2',
        `--header=${options.header}`,
    ];
    if (query) {
        args.push(`--query=${query}`);
    }
    return args;
}

/**
 * Map a finished finder run to an outcome.
 */
export function finderOutput_interpret(status: number, stdout: string, catalog: Catalog): FinderOutcome {
    if (status !== 0) {
        return { kind: 'cancelled', exitCode: status };
    }

    const output: string = stdout.trim();
    if (!output) {
        return { kind: 'cancelled', exitCode: 0 };
    }

    const firstLine: string = output.split(/\r?\n/)[0];
    const identifier: string = firstLine.split('\t')[0];
    const entry: CatalogEntry | undefined = catalog.find((e: CatalogEntry): boolean => e.identifier === identifier);
    return entry ? { kind: 'resolved', entry } : { kind: 'violation', output };
}

function errorCode_get(error: Error): string | undefined {
    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function signal_exitCode(signal: NodeJS.Signals): number {
    const number: number | undefined = osConstants.signals[signal];
    return 128 + (number ?? 1);
}

// ─── Strategy ────────────────────────────────────────────────────────────────

/**
 * `FinderStrategy` backed by an external process.
 */
export class ExternalFinder implements FinderStrategy {
    private readonly options: FinderOptions;

    constructor(options: FinderOptions) {
        this.options = options;
    }

    /**
     * Run the finder over the catalog, pre-filled with `query`.
     *
     * @returns null when the finder is disabled or not installed.
     * @throws FinderLaunchError when the finder exists but cannot run,
     *   or the configured timeout expires.
     */
    public finder_tryDelegate(catalog: Catalog, query: string): FinderOutcome | null {
        if (!this.options.enabled) return null;

        const executable: string | null = executable_resolve(this.options.command, this.options.env ?? process.env);
        if (!executable) return null;

        const input: string = catalog.map(entry_serialize).join('\n') + '\n';
        const result: SpawnSyncReturns<string> = spawnSync(executable, finderArgs_build(this.options, query), {
            input,
            encoding: 'utf-8',
            stdio: ['pipe', 'pipe', 'pipe'],
            maxBuffer: FINDER_MAX_BUFFER,
            timeout: this.options.timeoutMs > 0 ? this.options.timeoutMs : undefined,
        });

        if (result.error) {
            const code: string | undefined = errorCode_get(result.error);
            // Removed between lookup and spawn.
            if (code === 'ENOENT') return null;
            throw new FinderLaunchError(this.options.command, code === 'ETIMEDOUT'
                ? `timed out after ${this.options.timeoutMs} ms`
                : result.error.message);
        }

        if (result.status === null) {
            return { kind: 'cancelled', exitCode: result.signal ? signal_exitCode(result.signal) : 1 };
        }
        return finderOutput_interpret(result.status, result.stdout ?? '', catalog);
    }
}
