#!/usr/bin/env node
/**
 * cli.ts — Entry point for the ticker CLI.
 *
 * Loads `.env`, parses raw `process.argv`, routes to the matching command
 * handler in `./cli-commands.js`, and handles top-level errors.
 *
 * @module cli
 */

import { config as loadEnv } from "dotenv";
import { DIM, RED, c } from "./cli-format.js";
import {
	cmdHealth,
	cmdMessage,
	cmdPlugins,
	cmdProviders,
	cmdServe,
	showHelp,
	showVersion,
} from "./cli-commands.js";
import { describeError } from "./errors.js";
import { setLogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
//  Argument parsing
// ---------------------------------------------------------------------------

/**
 * The result of parsing raw CLI arguments.
 *
 * `positional` holds bare tokens (sub-command name, plugin names, etc.)
 * while `flags` holds `--key` / `--key value` pairs.
 */
interface ParsedArgs {
	positional: string[];
	flags: Record<string, string | boolean>;
}

/**
 * Parse a raw argv slice into positional tokens and named flags.
 *
 * If the token after a `--flag` does not itself start with `--`, it is
 * consumed as the flag's value; otherwise the flag is boolean `true`.
 */
function parseArgs(argv: string[]): ParsedArgs {
	const positional: string[] = [];
	const flags: Record<string, string | boolean> = {};

	let i = 0;
	while (i < argv.length) {
		const arg = argv[i];
		if (arg.startsWith("--")) {
			const key = arg.slice(2);
			const next = argv[i + 1];
			if (next && !next.startsWith("--")) {
				flags[key] = next;
				i += 2;
			} else {
				flags[key] = true;
				i += 1;
			}
		} else {
			positional.push(arg);
			i += 1;
		}
	}

	return { positional, flags };
}

// ---------------------------------------------------------------------------
//  Main entry point
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
	loadEnv();
	const { positional, flags } = parseArgs(process.argv.slice(2));
	const command = positional[0];

	if (flags.help || command === "help") {
		showHelp();
		return;
	}

	if (flags.version) {
		showVersion();
		return;
	}

	if (!command) {
		showHelp();
		return;
	}

	// One-shot commands keep stdout for their own output unless asked otherwise
	if (command !== "serve" && !flags.verbose && !process.env.LOG_LEVEL) {
		setLogLevel("warn");
	}

	switch (command) {
		case "message":
		case "msg":
			await cmdMessage(flags);
			break;

		case "providers":
			await cmdProviders(flags);
			break;

		case "plugins":
			await cmdPlugins(positional[1], positional[2], flags);
			break;

		case "health":
			await cmdHealth(flags);
			break;

		case "serve":
			await cmdServe(flags);
			break;

		default:
			console.error(c(RED, `Unknown command: "${command}"`));
			console.error(c(DIM, 'Run "ticker --help" for usage information.'));
			process.exit(1);
	}
}

main().catch((err: unknown) => {
	console.error(c(RED, `Error: ${describeError(err)}`));
	process.exit(1);
});
