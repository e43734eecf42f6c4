/**
 * cli-format.ts — Presentation helpers for the CLI.
 *
 * Everything the CLI prints goes through the library's own chunk
 * renderer at the tier held by {@link CliOutput}, so `--colors plain`
 * or a piped stdout yields output with no escape bytes.
 *
 * @module cli-format
 */

import type { TerminalCapabilities } from "./capabilities.js";
import { bold, faint, fore } from "./chunk.js";
import { cyan, red, yellow } from "./colours.js";
import { layoutAsTable } from "./layout.js";
import { writeChunksWith } from "./render.js";
import type { ByteSink, Chunk, ChunkLike } from "./types.js";

/** Where CLI output goes and how richly it is styled. */
export interface CliOutput {
	/** Tier every command renders at. */
	caps: TerminalCapabilities;
	/** `"flag"` when `--colors` chose the tier, `"environment"` when it was detected. */
	capsSource: "flag" | "environment";
	/** Sink for normal output, usually `process.stdout`. */
	stdout: ByteSink;
	/** Environment the tier was detected from; shown by `caps`. */
	env: NodeJS.ProcessEnv;
}

// ---------------------------------------------------------------------------
//  Styles
// ---------------------------------------------------------------------------

export function strong(text: string): Chunk {
	return bold(text);
}

export function muted(text: string): Chunk {
	return faint(text);
}

export function accent(text: string): Chunk {
	return fore(cyan, text);
}

export function failure(text: string): Chunk {
	return fore(red, text);
}

export function warning(text: string): Chunk {
	return fore(yellow, text);
}

// ---------------------------------------------------------------------------
//  Printing
// ---------------------------------------------------------------------------

/** Write chunks verbatim. */
export function printChunks(out: CliOutput, chunks: Iterable<ChunkLike>): Promise<void> {
	return writeChunksWith(out.caps, out.stdout, chunks);
}

/** Write chunks followed by a newline. */
export function printLine(out: CliOutput, ...chunks: ChunkLike[]): Promise<void> {
	return printChunks(out, [...chunks, "\n"]);
}

/** Lay out `rows` as an aligned table and write it. */
export function printTable(out: CliOutput, rows: readonly (readonly ChunkLike[])[]): Promise<void> {
	return printChunks(out, layoutAsTable(rows));
}
