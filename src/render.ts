/**
 * chunk-colour — Rendering chunks to bytes and writing them to a sink.
 *
 * A styled chunk is always followed by a full reset (`ESC[0m`), so no
 * style leaks into whatever is written next. Plain chunks are emitted as
 * bare UTF-8.
 * @module
 */

import type { TerminalCapabilities } from "./capabilities.js";
import { isPlain, requiredSGR, toChunk } from "./chunk.js";
import { RESET_SEQUENCE, renderCSI } from "./sgr.js";
import type { ByteSink, ChunkLike } from "./types.js";

// ---------------------------------------------------------------------------
//  Rendering
// ---------------------------------------------------------------------------

/** Render a single chunk to a string of text and escape sequences. */
export function renderChunkText(tier: TerminalCapabilities, value: ChunkLike): string {
	const c = toChunk(value);
	if (isPlain(tier, c)) return c.text;
	return renderCSI(requiredSGR(tier, c)) + c.text + RESET_SEQUENCE;
}

/** Render a single chunk to UTF-8 bytes. */
export function renderChunk(tier: TerminalCapabilities, value: ChunkLike): Buffer {
	return Buffer.from(renderChunkText(tier, value), "utf8");
}

/** Render chunks back to back, with nothing in between, to a string. */
export function renderChunksText(tier: TerminalCapabilities, chunks: Iterable<ChunkLike>): string {
	let out = "";
	for (const c of chunks) out += renderChunkText(tier, c);
	return out;
}

/**
 * Render chunks back to back to UTF-8 bytes.
 *
 * Each chunk is encoded on its own, so the result is always the byte
 * concatenation of {@link renderChunk} over the input.
 */
export function renderChunks(tier: TerminalCapabilities, chunks: Iterable<ChunkLike>): Buffer {
	const parts: Buffer[] = [];
	for (const c of chunks) parts.push(renderChunk(tier, c));
	return Buffer.concat(parts);
}

// ---------------------------------------------------------------------------
//  Output
// ---------------------------------------------------------------------------

/**
 * Render `chunks` and write the bytes to `sink` in a single write.
 * Resolves once the sink reports the write done; rejects with its error.
 */
export function writeChunksWith(tier: TerminalCapabilities, sink: ByteSink, chunks: Iterable<ChunkLike>): Promise<void> {
	const bytes = renderChunks(tier, chunks);
	return new Promise((resolve, reject) => {
		sink.write(bytes, (error) => {
			if (error) reject(error);
			else resolve();
		});
	});
}

/** {@link writeChunksWith} targeting `process.stdout`. */
export function putChunksWith(tier: TerminalCapabilities, chunks: Iterable<ChunkLike>): Promise<void> {
	return writeChunksWith(tier, process.stdout, chunks);
}
