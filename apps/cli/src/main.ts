#!/usr/bin/env tsx
/**
 * index-tape entry point.
 *
 * Usage:
 *   index-tape ./exports ACS AENA --target-date 06/02/2024
 */

import { flushLogger } from "@index-tape/logger";
import { log } from "./logger.js";
import { runCli } from "./run.js";

process.exitCode = await runCli(process.argv.slice(2), {
	write: (line) => process.stdout.write(`${line}\n`),
	error: (line) => process.stderr.write(`${line}\n`),
	env: process.env,
});

await flushLogger(log);
