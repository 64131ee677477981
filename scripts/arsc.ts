#!/usr/bin/env -S npx tsx
/**
 * ARSC command-line entry point
 *
 * Usage: npm run arsc -- proteomes/ -t 4 -o arsc.tsv
 */

import { runCli } from "../src/cli";

process.exitCode = await runCli(process.argv.slice(2));
