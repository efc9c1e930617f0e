#!/usr/bin/env node
/**
 * @file flow CLI Entry Point
 *
 * Usage:
 *   flow                    pick a command interactively
 *   flow hel                pre-filter, run directly when one command matches
 *   flow hello Ada          run a command by name with arguments
 *   flow -- Ada             pick a command, then pass it `Ada`
 *
 * @module
 */

import { flow_run } from './FlowCli.js';

flow_run(process.argv.slice(2))
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((e: Error) => {
        console.error(`Fatal error: ${e.message}`);
        process.exit(1);
    });
