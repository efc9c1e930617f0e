import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { scripts_run, SCRIPTS_USAGE, type ScriptExecutor } from './ScriptsCli.js';
import type { CliDeps } from './session.js';
import type { FinderOutcome } from '../picker/types.js';
import {
    captureSink_create,
    plainColors,
    ScriptedReader,
    StubFinder,
    type CaptureSink,
} from '../testing/fakes.js';

describe('scripts_run', (): void => {
    let root: string;
    let sink: CaptureSink;
    let execute: Mock<ScriptExecutor>;

    beforeEach((): void => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'fuzzpick-run-'));
        sink = captureSink_create();
        execute = vi.fn<ScriptExecutor>((): number => 0);
    });

    afterEach((): void => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    function scripts_write(dir: string, names: string[]): void {
        fs.mkdirSync(path.join(root, dir), { recursive: true });
        for (const name of names) {
            fs.writeFileSync(path.join(root, dir, name), 'console.log("hi");\n');
        }
    }

    function deps_make(finderOutcome: FinderOutcome | null, lines: Array<string | null> = []): CliDeps & { finder: StubFinder } {
        return {
            cwd: root,
            env: {},
            sink,
            colors: plainColors,
            finder: new StubFinder(finderOutcome),
            reader_open: (): ScriptedReader => new ScriptedReader(lines),
        };
    }

    it('runs the single script matching the query with passthrough arguments', async (): Promise<void> => {
        scripts_write('scripts', ['split_mp3.ts', 'update_version.ts']);
        const deps = deps_make(null);

        expect(await scripts_run(['spl', '--', '--out', 'a b.mp3'], deps, execute)).toBe(0);
        expect(deps.finder.calls).toHaveLength(0);
        expect(execute).toHaveBeenCalledWith(
            {
                name: 'split_mp3',
                absolutePath: path.join(root, 'scripts', 'split_mp3.ts'),
                relativePath: 'scripts/split_mp3.ts',
            },
            ['--out', 'a b.mp3'],
            root
        );
        expect(sink.outLines).toEqual(["→ Running scripts/split_mp3.ts --out 'a b.mp3'"]);
    });

    it("returns the script's exit code", async (): Promise<void> => {
        scripts_write('scripts', ['deploy.mjs']);
        execute.mockReturnValue(3);

        expect(await scripts_run(['deploy'], deps_make(null), execute)).toBe(3);
    });

    it('lists scripts with their paths', async (): Promise<void> => {
        scripts_write('scripts', ['update_version.ts', 'split_mp3.ts', '_shared.ts']);

        expect(await scripts_run(['--list'], deps_make(null), execute)).toBe(0);
        expect(sink.outLines).toEqual([
            'split_mp3  (scripts/split_mp3.ts)',
            'update_version  (scripts/update_version.ts)',
        ]);
        expect(execute).not.toHaveBeenCalled();
    });

    it('reports an empty listing as an error', async (): Promise<void> => {
        expect(await scripts_run(['--list'], deps_make(null), execute)).toBe(2);
        expect(sink.errLines).toEqual(['>> ERROR: No scripts found in the scripts/ directory.']);
    });

    it('reports a missing scripts directory without prompting', async (): Promise<void> => {
        const deps = deps_make(null);
        expect(await scripts_run([], deps, execute)).toBe(2);

        expect(sink.errLines).toEqual(['>> ERROR: No scripts found.']);
        expect(deps.finder.calls).toHaveLength(0);
    });

    it('follows the scripts directory from the project file', async (): Promise<void> => {
        scripts_write('tools', ['lint.ts']);
        fs.writeFileSync(path.join(root, 'fuzzpick.yaml'), 'scripts:\n  dir: tools\n');

        expect(await scripts_run(['--list'], deps_make(null), execute)).toBe(0);
        expect(sink.outLines).toEqual(['lint  (tools/lint.ts)']);
    });

    it('resolves the project from --root', async (): Promise<void> => {
        const project: string = path.join(root, 'project');
        fs.mkdirSync(path.join(project, 'scripts'), { recursive: true });
        fs.writeFileSync(path.join(project, 'scripts', 'seed.js'), '');

        expect(await scripts_run(['--root', 'project', 'seed'], deps_make(null), execute)).toBe(0);
        expect(execute.mock.calls[0][2]).toBe(project);
        expect(sink.outLines).toEqual(['→ Running scripts/seed.js']);
    });

    it('uses the finder for ambiguous queries', async (): Promise<void> => {
        scripts_write('scripts', ['split_mp3.ts', 'update_version.ts']);
        const deps = deps_make({
            kind: 'resolved',
            entry: { identifier: 'update_version', primaryLabel: 'update_version', secondaryLabel: 'scripts/update_version.ts' },
        });

        expect(await scripts_run([], deps, execute)).toBe(0);
        expect(deps.finder.calls[0].query).toBe('');
        expect(execute.mock.calls[0][0].name).toBe('update_version');
    });

    it('does not run anything when the finder is dismissed', async (): Promise<void> => {
        scripts_write('scripts', ['a.ts', 'b.ts']);

        expect(await scripts_run([], deps_make({ kind: 'cancelled', exitCode: 0 }), execute)).toBe(0);
        expect(sink.errLines).toEqual(['○ No script selected.']);
        expect(execute).not.toHaveBeenCalled();
    });

    it('falls back to the numbered prompt', async (): Promise<void> => {
        scripts_write('scripts', ['split_mp3.ts', 'update_version.ts']);

        expect(await scripts_run([], deps_make(null, ['2']), execute)).toBe(0);
        expect(execute.mock.calls[0][0].name).toBe('update_version');
        expect(sink.outLines).toEqual([
            '1. split_mp3  (scripts/split_mp3.ts)',
            '2. update_version  (scripts/update_version.ts)',
            '→ Running scripts/update_version.ts',
        ]);
    });

    it('prints usage', async (): Promise<void> => {
        expect(await scripts_run(['-h'], deps_make(null), execute)).toBe(0);
        expect(sink.outLines).toEqual([SCRIPTS_USAGE]);
    });

    it('rejects invalid project settings', async (): Promise<void> => {
        fs.writeFileSync(path.join(root, 'fuzzpick.yaml'), 'scripts:\n  dir: 7\n');
        await expect(scripts_run([], deps_make(null), execute)).rejects.toThrow('Invalid settings in');
    });
});
