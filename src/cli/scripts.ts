#!/usr/bin/env node
/**
 * @file scripts CLI Entry Point
 *
 * Usage:
 *   scripts                 pick a script interactively
 *   scripts split           pre-filter, run directly when one script matches
 *   scripts --list          list discovered scripts
 *   scripts mp3 -- a.mp3    pick, then pass `a.mp3` to the script
 *
 * @module
 */

import { scripts_run } from './ScriptsCli.js';

scripts_run(process.argv.slice(2))
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((e: Error) => {
        console.error(`Fatal error: ${e.message}`);
        process.exit(1);
    });
