/**
 * chunk-colour — Column-aligned table layout.
 *
 * Takes a grid of chunks and returns a flat chunk list ready for
 * `renderChunks`: each cell is followed by an unstyled padding chunk,
 * cells are separated by a single space and each row ends in `"\n"`.
 *
 * Widths are code-point counts of the cell text. Styling never affects
 * layout.
 * @module
 */

import { chunk, toChunk } from "./chunk.js";
import type { Chunk, ChunkLike, Table } from "./types.js";

/** Display width of `text`, counted in code points. */
export function displayWidth(text: string): number {
	let width = 0;
	for (const _ of text) width++;
	return width;
}

/** An unstyled run of `width` spaces. */
function paddingChunk(width: number): Chunk {
	return chunk(" ".repeat(width));
}

/**
 * Right-pad every row with empty chunks so all rows share the length of
 * the longest one. Never truncates.
 */
export function padRows(rows: readonly (readonly ChunkLike[])[]): Chunk[][] {
	if (rows.length === 0) return [];
	const maxLength = rows.reduce((max, row) => Math.max(max, row.length), 0);

	return rows.map((row) => {
		const padded = row.map(toChunk);
		while (padded.length < maxLength) padded.push(chunk(""));
		return padded;
	});
}

/**
 * Lay out an already rectangular table.
 *
 * Column widths come from the widest cell in each column. For a row of
 * cells `a, b, c` the output is
 * `a, pad(a), " ", b, pad(b), " ", c, pad(c), "\n"`.
 */
export function renderTable(table: Table): Chunk[] {
	const widths: number[] = [];
	const measured = table.cells.map((row) =>
		row.map((cell, column) => {
			const width = displayWidth(cell.text);
			widths[column] = Math.max(widths[column] ?? 0, width);
			return { cell, width };
		}),
	);

	const output: Chunk[] = [];
	for (const row of measured) {
		row.forEach(({ cell, width }, column) => {
			output.push(cell, paddingChunk((widths[column] ?? width) - width));
			if (column < row.length - 1) output.push(chunk(" "));
		});
		output.push(chunk("\n"));
	}
	return output;
}

/**
 * Pad rows to equal length, then lay them out as a table.
 *
 * @example
 * ```ts
 * renderChunksText(TerminalCapabilities.Plain, layoutAsTable([["a", "bb"], ["ccc"]]));
 * // "a   bb\nccc   \n"
 * ```
 */
export function layoutAsTable(rows: readonly (readonly ChunkLike[])[]): Chunk[] {
	return renderTable({ cells: padRows(rows) });
}
