/**
 * cli-commands.ts — Command implementations for the chunk-colour CLI.
 *
 * Each exported `cmd*` function corresponds to a top-level CLI sub-command.
 * Commands never call `process.exit`; usage and input errors are thrown
 * and reported by the dispatcher in `cli.ts`.
 *
 * @module cli-commands
 */

import { readFile } from "fs/promises";
import { text } from "node:stream/consumers";
import { TerminalCapabilities, capabilitiesName, supports } from "./capabilities.js";
import { back, fore } from "./chunk.js";
import { TERMINAL_COLOURS, colour256, colour8, colourRGB } from "./colours.js";
import { decodeChunks, decodeRows } from "./decode.js";
import { layoutAsTable } from "./layout.js";
import { renderChunksText } from "./render.js";
import type { Chunk, ChunkLike } from "./types.js";
import {
	accent, failure, muted, strong, warning,
	printChunks, printLine, printTable,
} from "./cli-format.js";
import type { CliOutput } from "./cli-format.js";

/** CLI version string — kept in sync with `package.json`. */
const VERSION = "0.1.0";

type Flags = Record<string, string | boolean>;

/** Show an environment variable, or a muted placeholder when unset. */
function envCell(value: string | undefined): ChunkLike {
	return value === undefined ? muted("(unset)") : value;
}

/**
 * Read and parse a JSON document from a file path, or from stdin for `-`.
 *
 * @param source  A file path or `"-"`.
 * @returns       The parsed, still unvalidated, JSON value.
 */
export async function readDocument(source: string): Promise<unknown> {
	const raw = source === "-" ? await text(process.stdin) : await readFile(source, "utf-8");
	try {
		return JSON.parse(raw);
	} catch (error) {
		throw new Error(`${source === "-" ? "stdin" : source}: invalid JSON (${error instanceof Error ? error.message : String(error)})`);
	}
}

/** Print rendered chunks, or their JSON-escaped form with `--escape`. */
function emit(out: CliOutput, chunks: readonly Chunk[], flags: Flags): Promise<void> {
	if (flags.escape) return printLine(out, JSON.stringify(renderChunksText(out.caps, chunks)));
	return printChunks(out, chunks);
}

// ── caps ─────────────────────────────────────────────────────────────────

/**
 * Show the active capability tier and the variables it was derived from.
 * With `--json` the same information is emitted as JSON.
 */
export async function cmdCaps(out: CliOutput, flags: Flags): Promise<void> {
	const { TERM, COLORTERM, NO_COLOR } = out.env;

	if (flags.json) {
		const report = {
			capabilities: capabilitiesName(out.caps),
			source: out.capsSource,
			env: { TERM: TERM ?? null, COLORTERM: COLORTERM ?? null, NO_COLOR: NO_COLOR ?? null },
		};
		await printLine(out, JSON.stringify(report, null, 2));
		return;
	}

	await printTable(out, [
		[muted("capabilities"), accent(capabilitiesName(out.caps))],
		[muted("source"), out.capsSource === "flag" ? "--colors" : "environment"],
		[muted("TERM"), envCell(TERM)],
		[muted("COLORTERM"), envCell(COLORTERM)],
		[muted("NO_COLOR"), envCell(NO_COLOR)],
	]);
}

// ── palette ──────────────────────────────────────────────────────────────

/**
 * Print the sixteen classic colours as a table.
 * `--256` adds the 8-bit palette grid, `--rgb` a 24-bit gradient.
 */
export async function cmdPalette(out: CliOutput, flags: Flags): Promise<void> {
	const rows: ChunkLike[][] = [
		[strong("colour"), strong("dull"), strong("bright"), strong("dull bg"), strong("bright bg")],
	];
	for (const name of TERMINAL_COLOURS) {
		rows.push([
			name,
			fore(colour8("dull", name), name),
			fore(colour8("bright", name), name),
			back(colour8("dull", name), ` ${name} `),
			back(colour8("bright", name), ` ${name} `),
		]);
	}
	await printTable(out, rows);

	if (flags["256"]) {
		await printLine(out);
		await noteUnsupported(out, TerminalCapabilities.With8BitColours);
		const grid: Chunk[][] = [];
		for (let row = 0; row < 16; row++) {
			const cells: Chunk[] = [];
			for (let column = 0; column < 16; column++) {
				const index = row * 16 + column;
				cells.push(back(colour256(index), String(index).padStart(3)));
			}
			grid.push(cells);
		}
		await printTable(out, grid);
	}

	if (flags.rgb) {
		await printLine(out);
		await noteUnsupported(out, TerminalCapabilities.With24BitColours);
		const steps = 32;
		const gradient: Chunk[] = [];
		for (let i = 0; i < steps; i++) {
			const level = Math.round((i * 255) / (steps - 1));
			gradient.push(back(colourRGB(level, 255 - level, 128), " "));
		}
		await printLine(out, ...gradient);
	}
}

/** Warn that a palette section will print without colour at the current tier. */
async function noteUnsupported(out: CliOutput, required: TerminalCapabilities): Promise<void> {
	if (supports(out.caps, required)) return;
	await printLine(out, warning(`${capabilitiesName(required)} not available at ${capabilitiesName(out.caps)}; showing without colour`));
}

// ── table ────────────────────────────────────────────────────────────────

/**
 * Lay out a JSON rows document as an aligned table.
 *
 * @param source  File path, or `-` for stdin.
 * @param flags   CLI flags (supports `--escape`).
 */
export async function cmdTable(out: CliOutput, source: string, flags: Flags): Promise<void> {
	if (!source) throw new Error("Usage: chunk-colour table <file|->");
	const rows = decodeRows(await readDocument(source));
	await emit(out, layoutAsTable(rows), flags);
}

// ── render ───────────────────────────────────────────────────────────────

/**
 * Render a JSON chunk array verbatim, with no separators or trailing newline.
 *
 * @param source  File path, or `-` for stdin.
 * @param flags   CLI flags (supports `--escape`).
 */
export async function cmdRender(out: CliOutput, source: string, flags: Flags): Promise<void> {
	if (!source) throw new Error("Usage: chunk-colour render <file|->");
	const chunks = decodeChunks(await readDocument(source));
	await emit(out, chunks, flags);
}

// ── serve ────────────────────────────────────────────────────────────────

/**
 * Start the HTTP render service on the given port.
 * The server module is loaded via dynamic import to keep Hono out of the
 * path of the other commands.
 *
 * @param flags  CLI flags (supports `--port <number>`; falls back to `PORT`, then `3000`).
 */
export async function cmdServe(out: CliOutput, flags: Flags): Promise<void> {
	const raw = typeof flags.port === "string" ? flags.port : out.env.PORT;
	const port = raw === undefined ? 3000 : /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;

	if (Number.isNaN(port) || port < 1 || port > 65535) {
		throw new Error(`Invalid port: ${String(raw)}`);
	}

	const { startServer } = await import("./server.js");
	// Only an explicit --colors carries over to the service.
	startServer(port, { defaultCapabilities: out.capsSource === "flag" ? out.caps : undefined });
}

// ── help & version ───────────────────────────────────────────────────────

/** Print the full CLI usage / help text. */
export async function showHelp(out: CliOutput): Promise<void> {
	const command = (name: string, args: string, description: string): ChunkLike[] => [
		"  ", accent(name), args.padEnd(28 - name.length), description, "\n",
	];

	await printChunks(out, [
		strong("chunk-colour"), " ", muted("— capability-aware ANSI styling and table layout"), "\n\n",
		strong("USAGE"), "\n",
		"  chunk-colour <command> [options]\n\n",
		strong("COMMANDS"), "\n",
		...command("caps", "", "Show the detected terminal capabilities"),
		...command("palette", " [--256] [--rgb]", "Print the colour palette"),
		...command("table", " <file|->", "Lay out a JSON rows document as a table"),
		...command("render", " <file|->", "Render a JSON chunk array"),
		...command("serve", " [--port 3000]", "Start the HTTP render service"),
		"\n",
		strong("OPTIONS"), "\n",
		"  --colors <tier>             plain, 8, 256 or truecolor (default: detect)\n",
		"  --escape                    Print output as a JSON string (table, render)\n",
		"  --json                      Output as JSON (caps)\n",
		"  --help                      Show this help message\n",
		"  --version                   Show version\n\n",
		strong("EXAMPLES"), "\n",
		muted("  $"), " chunk-colour caps\n",
		muted("  $"), " chunk-colour palette --256 --colors 256\n",
		muted("  $"), " chunk-colour table report.json\n",
		muted("  $"), " echo '[{\"text\":\"hi\",\"bold\":true}]' | chunk-colour render - --escape\n",
	]);
}

/** Print the CLI version string. */
export async function showVersion(out: CliOutput): Promise<void> {
	await printLine(out, `chunk-colour v${VERSION}`);
}

/** The lines the dispatcher prints for a failed command. */
export function formatError(message: string): ChunkLike[] {
	return [failure(`Error: ${message}`), "\n", muted('Run "chunk-colour --help" for usage information.'), "\n"];
}
