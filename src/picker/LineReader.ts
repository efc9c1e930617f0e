/**
 * @file Readline line reader
 *
 * Production `LineReader` for the manual prompt loop. Ctrl+C while a
 * prompt is pending, and end of input, are delivered as an `interrupted`
 * result instead of a process signal or an exception.
 *
 * Lines are collected by one persistent `line` listener. readline emits
 * every line of an input chunk at once (piped stdin, a paste), so lines
 * that arrive before the next `line_read` wait in a queue.
 *
 * @module
 */

import * as readline from 'readline';
import type { LineReader, LineReadResult } from './types.js';

export interface ReadlineReaderOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

type LineWaiter = (result: LineReadResult) => void;

export class ReadlineLineReader implements LineReader {
    private readonly rl: readline.Interface;
    private readonly output: NodeJS.WritableStream;
    private readonly pending: string[] = [];
    private waiter: LineWaiter | null = null;
    private closed: boolean = false;

    constructor(options: ReadlineReaderOptions = {}) {
        const input: NodeJS.ReadableStream = options.input ?? process.stdin;
        this.output = options.output ?? process.stderr;
        this.rl = readline.createInterface({ input, output: this.output, terminal: 'isTTY' in input && input.isTTY === true });

        this.rl.on('line', (line: string): void => {
            if (this.waiter) {
                this.waiter_settle({ kind: 'line', text: line });
            } else {
                this.pending.push(line);
            }
        });
        this.rl.on('SIGINT', (): void => {
            // Leave the aborted prompt line behind, like a shell does.
            this.output.write('\n');
            this.waiter_settle({ kind: 'interrupted' });
        });
        this.rl.on('close', (): void => {
            this.closed = true;
            this.waiter_settle({ kind: 'interrupted' });
        });
    }

    /**
     * Show `prompt` and return the next line, queued or typed.
     */
    public line_read(prompt: string): Promise<LineReadResult> {
        if (!this.closed) {
            this.rl.setPrompt(prompt);
            this.rl.prompt();
        }

        const queued: string | undefined = this.pending.shift();
        if (queued !== undefined) {
            return Promise.resolve({ kind: 'line', text: queued });
        }
        if (this.closed) {
            return Promise.resolve({ kind: 'interrupted' });
        }

        return new Promise<LineReadResult>((resolve: LineWaiter): void => {
            this.waiter = resolve;
        });
    }

    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.rl.close();
    }

    private waiter_settle(result: LineReadResult): void {
        const waiter: LineWaiter | null = this.waiter;
        this.waiter = null;
        waiter?.(result);
    }
}
