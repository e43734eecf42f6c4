/**
 * chunk-colour — Public API barrel export.
 *
 * Re-exports the chunk model, renderer and table layout so consumers can
 * import from a single `"chunk-colour"` entry point.
 *
 * @example
 * ```ts
 * import { TerminalCapabilities, bold, chunk, colourRGB, fore, renderChunkText } from "chunk-colour";
 *
 * renderChunkText(TerminalCapabilities.With24BitColours, bold(fore(colourRGB(10, 20, 30), chunk("hi"))));
 * // "\x1b[1;38;2;10;20;30mhi\x1b[0m"
 * ```
 * @module
 */

export {
	TerminalCapabilities,
	ALL_CAPABILITIES,
	capabilitiesName,
	detectCapabilities,
	detectCapabilitiesFromEnv,
	parseCapabilities,
	supports,
} from "./capabilities.js";
export {
	back,
	bold,
	chunk,
	colourCapability,
	colourSGR,
	doubleUnderline,
	faint,
	fore,
	isPlain,
	italic,
	plainColour,
	requiredSGR,
	toChunk,
	underline,
} from "./chunk.js";
export {
	TERMINAL_COLOURS,
	black,
	blue,
	brightBlack,
	brightBlue,
	brightCyan,
	brightGreen,
	brightMagenta,
	brightRed,
	brightWhite,
	brightYellow,
	color256,
	colorRGB,
	colour256,
	colour8,
	colourRGB,
	cyan,
	green,
	magenta,
	red,
	white,
	yellow,
} from "./colours.js";
export { ChunkDecodeError, decodeChunk, decodeChunks, decodeColour, decodeRows } from "./decode.js";
export { displayWidth, layoutAsTable, padRows, renderTable } from "./layout.js";
export {
	putChunksWith,
	renderChunk,
	renderChunkText,
	renderChunks,
	renderChunksText,
	writeChunksWith,
} from "./render.js";
export { CSI, RESET_SEQUENCE, renderCSI, sgrParameters } from "./sgr.js";
export type { SGR } from "./sgr.js";
export type {
	ByteSink,
	Chunk,
	ChunkLike,
	Colour,
	ColourIntensity,
	ConsoleIntensity,
	ConsoleLayer,
	Table,
	TerminalColour,
	Underlining,
} from "./types.js";
