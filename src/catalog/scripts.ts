/**
 * @file Script catalog
 *
 * Discovers runnable script files in the project's scripts directory and
 * runs the one a picker resolved.
 *
 * Discovery is top-level only. Files whose name starts with an excluded
 * prefix (`_` and `.` by default) are skipped, as are directories, which
 * keeps build caches out of the catalog. Names holding a tab or line break
 * cannot travel over the finder protocol and are skipped too.
 *
 * TypeScript scripts run through the `tsx` loader installed with this
 * package, not one looked up from the scanned project.
 *
 * @module
 */

import { spawnSync, type SpawnSyncReturns } from 'child_process';
import fs from 'fs';
import { createRequire } from 'module';
import path from 'path';
import { pathToFileURL } from 'url';
import type { Catalog } from '../picker/types.js';
import { CatalogBuilder } from './CatalogBuilder.js';

export const SCRIPT_EXTENSIONS: readonly string[] = ['.ts', '.mts', '.js', '.mjs'];

const TYPESCRIPT_EXTENSIONS: readonly string[] = ['.ts', '.mts'];

const require = createRequire(import.meta.url);

export interface ScriptEntry {
    /** File stem. */
    name: string;
    absolutePath: string;
    /** Path relative to the project root, `/`-separated. */
    relativePath: string;
}

export interface ScriptScanOptions {
    root: string;
    scriptsDir: string;
    excludePrefixes: readonly string[];
}

/**
 * List script files, sorted by path.
 */
export function scripts_scan(options: ScriptScanOptions): ScriptEntry[] {
    const dir: string = path.resolve(options.root, options.scriptsDir);
    if (!fs.existsSync(dir)) return [];

    const entries: ScriptEntry[] = [];
    for (const dirent of fs.readdirSync(dir, { withFileTypes: true })) {
        if (!dirent.isFile()) continue;
        if (options.excludePrefixes.some((prefix: string): boolean => dirent.name.startsWith(prefix))) continue;
        if (/[\t\r\n]/.test(dirent.name)) continue;

        const ext: string = path.extname(dirent.name);
        if (!SCRIPT_EXTENSIONS.includes(ext)) continue;

        const absolutePath: string = path.join(dir, dirent.name);
        entries.push({
            name: path.basename(dirent.name, ext),
            absolutePath,
            relativePath: path.relative(options.root, absolutePath).split(path.sep).join('/'),
        });
    }

    return entries.sort((a: ScriptEntry, b: ScriptEntry): number =>
        a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0
    );
}

/**
 * Build the picker catalog for discovered scripts.
 *
 * @throws DuplicateEntryError when two files share a stem (`a.ts`, `a.js`).
 */
export function scriptCatalog_build(scripts: readonly ScriptEntry[]): Catalog {
    const builder: CatalogBuilder = new CatalogBuilder();
    for (const script of scripts) {
        builder.entry_add({ identifier: script.name, primaryLabel: script.name, secondaryLabel: script.relativePath });
    }
    return builder.catalog_build();
}

/**
 * Quote an argument for display the way a POSIX shell would need it.
 */
export function arg_quote(arg: string): string {
    if (arg === '') return "''";
    if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
    return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Human-readable description of a script run.
 */
export function scriptRun_describe(script: ScriptEntry, args: readonly string[]): string {
    const argText: string = args.map(arg_quote).join(' ');
    return argText ? `${script.relativePath} ${argText}` : script.relativePath;
}

/**
 * File URL of the `tsx` loader this package depends on.
 */
export function tsxLoader_resolve(): string {
    return pathToFileURL(require.resolve('tsx')).href;
}

/**
 * Node arguments that execute `script`; TypeScript goes through tsx.
 */
export function scriptCommand_build(script: ScriptEntry, args: readonly string[]): string[] {
    const loader: string[] = TYPESCRIPT_EXTENSIONS.includes(path.extname(script.absolutePath))
        ? ['--import', tsxLoader_resolve()]
        : [];
    return [...loader, script.absolutePath, ...args];
}

/**
 * Run a script with the current Node executable, inheriting stdio.
 *
 * @returns The child's exit code; 1 when it could not start or was killed.
 */
export function script_execute(script: ScriptEntry, args: readonly string[], root: string): number {
    const result: SpawnSyncReturns<Buffer> = spawnSync(process.execPath, scriptCommand_build(script, args), {
        cwd: root,
        env: process.env,
        stdio: 'inherit',
    });
    if (result.error) {
        throw result.error;
    }
    return result.status ?? 1;
}
