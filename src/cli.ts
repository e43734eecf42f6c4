#!/usr/bin/env node
/**
 * cli.ts — Entry point for the chunk-colour CLI.
 *
 * This module is intentionally minimal: it parses raw `process.argv`,
 * picks the output tier, routes to the matching command handler in
 * `./cli-commands.js`, and handles top-level errors.
 *
 * @module cli
 */

import { detectCapabilities, parseCapabilities } from "./capabilities.js";
import { renderChunksText } from "./render.js";
import type { CliOutput } from "./cli-format.js";
import {
	cmdCaps,
	cmdPalette,
	cmdRender,
	cmdServe,
	cmdTable,
	formatError,
	showHelp,
	showVersion,
} from "./cli-commands.js";

// ---------------------------------------------------------------------------
//  Argument parsing
// ---------------------------------------------------------------------------

/**
 * The result of parsing raw CLI arguments.
 *
 * `positional` holds bare tokens (sub-command name, file path, `-`)
 * while `flags` holds `--key` / `--key value` pairs.
 */
interface ParsedArgs {
	/** Non-flag tokens in the order they appeared (e.g. `["table", "rows.json"]`). */
	positional: string[];
	/** Flag map — boolean for bare flags, string when a value follows. */
	flags: Record<string, string | boolean>;
}

/** Flags that never take a value, so the next token stays positional. */
const BOOLEAN_FLAGS = new Set(["help", "version", "json", "escape", "256", "rgb"]);

/**
 * Parse a raw argv slice into positional tokens and named flags.
 *
 * Flags are identified by the `--` prefix. `--key=value` always carries
 * a value; otherwise, unless the flag is boolean, a following token that
 * does **not** start with `--` is consumed as its value.
 *
 * @param argv  The argument array, typically `process.argv.slice(2)`.
 */
function parseArgs(argv: string[]): ParsedArgs {
	const positional: string[] = [];
	const flags: Record<string, string | boolean> = {};

	let i = 0;
	while (i < argv.length) {
		const arg = argv[i];
		if (arg.startsWith("--")) {
			const eq = arg.indexOf("=");
			if (eq !== -1) {
				flags[arg.slice(2, eq)] = arg.slice(eq + 1);
				i += 1;
				continue;
			}
			const key = arg.slice(2);
			const next = argv[i + 1];
			if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith("--")) {
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

/**
 * Choose the output tier: `--colors` wins, otherwise detect from stdout
 * and the environment.
 */
function createOutput(flags: Record<string, string | boolean>): CliOutput {
	const base = { stdout: process.stdout, env: process.env };

	if (flags.colors !== undefined) {
		const caps = typeof flags.colors === "string" ? parseCapabilities(flags.colors) : undefined;
		if (caps === undefined) {
			throw new Error(`Unknown colour tier: "${String(flags.colors)}" (expected plain, 8, 256 or truecolor)`);
		}
		return { ...base, caps, capsSource: "flag" };
	}

	return { ...base, caps: detectCapabilities(process.stdout), capsSource: "environment" };
}

// ---------------------------------------------------------------------------
//  Main entry point
// ---------------------------------------------------------------------------

/**
 * Top-level CLI dispatcher.
 *
 * Parses arguments, checks for global flags (`--help`, `--version`),
 * then routes to the matching command handler.
 */
async function main(): Promise<void> {
	const { positional, flags } = parseArgs(process.argv.slice(2));
	const command = positional[0];
	const out = createOutput(flags);

	// Global flags — handled before any command
	if (flags.help || command === "help") {
		await showHelp(out);
		return;
	}

	if (flags.version) {
		await showVersion(out);
		return;
	}

	if (!command) {
		await showHelp(out);
		return;
	}

	switch (command) {
		case "caps":
			await cmdCaps(out, flags);
			break;

		case "palette":
			await cmdPalette(out, flags);
			break;

		case "table":
			await cmdTable(out, positional[1] ?? "", flags);
			break;

		case "render":
			await cmdRender(out, positional[1] ?? "", flags);
			break;

		case "serve":
			await cmdServe(out, flags);
			break;

		default:
			throw new Error(`Unknown command: "${command}"`);
	}
}

// Report failures on stderr, styled for stderr's own tier
main().catch((err: unknown) => {
	const message = err instanceof Error ? err.message : String(err);
	process.stderr.write(renderChunksText(detectCapabilities(process.stderr), formatError(message)));
	process.exitCode = 1;
});
