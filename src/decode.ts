/**
 * chunk-colour — JSON chunk documents.
 *
 * The CLI and the render service accept chunks as JSON:
 *
 * ```json
 * [["Name", { "text": "Status", "bold": true }],
 *  ["api", { "text": "up", "fore": "green" }],
 *  ["db", { "text": "down", "fore": "#ff3030", "underline": "double" }]]
 * ```
 *
 * A colour is a name (`"red"`, `"bright-red"`, `"brightRed"`), a
 * `#rrggbb` hex string, a palette index (0–255) or `{ "r", "g", "b" }`.
 * @module
 */

import { back, bold, chunk, doubleUnderline, faint, fore, italic, underline } from "./chunk.js";
import { TERMINAL_COLOURS, colour256, colour8, colourRGB } from "./colours.js";
import type { Chunk, Colour } from "./types.js";

/** Raised for a malformed document; `path` points at the offending value. */
export class ChunkDecodeError extends Error {
	readonly path: string;

	constructor(path: string, message: string) {
		super(`${path}: ${message}`);
		this.name = "ChunkDecodeError";
		this.path = path;
	}
}

const CHUNK_KEYS = new Set(["text", "fore", "back", "bold", "faint", "italic", "underline"]);
const HEX_COLOUR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "an array";
	const type = typeof value;
	return type === "object" || type === "undefined" ? `an ${type}` : `a ${type}`;
}

/** Look up `"red"`, `"bright-red"`, `"brightRed"`, `"BRIGHT_RED"`, ... */
function namedColour(name: string): Colour | undefined {
	const key = name.toLowerCase().replace(/[-_\s]/g, "");
	const bright = key.startsWith("bright");
	const base = bright ? key.slice("bright".length) : key;
	const colour = TERMINAL_COLOURS.find((c) => c === base);
	return colour === undefined ? undefined : colour8(bright ? "bright" : "dull", colour);
}

function byteAt(value: unknown, path: string): number {
	if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 255) {
		throw new ChunkDecodeError(path, "expected an integer between 0 and 255");
	}
	return value;
}

function flagAt(value: unknown, path: string): boolean {
	if (typeof value !== "boolean") throw new ChunkDecodeError(path, `expected a boolean, got ${describeValue(value)}`);
	return value;
}

/** Decode a single colour value. */
export function decodeColour(value: unknown, path = "$"): Colour {
	if (typeof value === "number") return colour256(byteAt(value, path));

	if (typeof value === "string") {
		const hex = HEX_COLOUR.exec(value);
		if (hex) return colourRGB(parseInt(hex[1], 16), parseInt(hex[2], 16), parseInt(hex[3], 16));
		const named = namedColour(value);
		if (named) return named;
		throw new ChunkDecodeError(path, `unknown colour "${value}"`);
	}

	if (isRecord(value)) {
		return colourRGB(byteAt(value.r, `${path}.r`), byteAt(value.g, `${path}.g`), byteAt(value.b, `${path}.b`));
	}

	throw new ChunkDecodeError(path, `expected a colour, got ${describeValue(value)}`);
}

/**
 * Decode a single chunk: a bare string or a styled object.
 * When both `bold` and `faint` are true, faint is applied last and wins.
 */
export function decodeChunk(value: unknown, path = "$"): Chunk {
	if (typeof value === "string") return chunk(value);
	if (!isRecord(value)) throw new ChunkDecodeError(path, `expected a string or an object, got ${describeValue(value)}`);

	for (const key of Object.keys(value)) {
		if (!CHUNK_KEYS.has(key)) throw new ChunkDecodeError(`${path}.${key}`, "unknown chunk attribute");
	}
	if (typeof value.text !== "string") throw new ChunkDecodeError(`${path}.text`, "expected a string");

	let c = chunk(value.text);
	if (value.fore !== undefined) c = fore(decodeColour(value.fore, `${path}.fore`), c);
	if (value.back !== undefined) c = back(decodeColour(value.back, `${path}.back`), c);
	if (value.italic !== undefined && flagAt(value.italic, `${path}.italic`)) c = italic(c);
	if (value.bold !== undefined && flagAt(value.bold, `${path}.bold`)) c = bold(c);
	if (value.faint !== undefined && flagAt(value.faint, `${path}.faint`)) c = faint(c);

	// underline: true | "single" | "double"
	const u = value.underline;
	if (u === true || u === "single") c = underline(c);
	else if (u === "double") c = doubleUnderline(c);
	else if (u !== undefined && u !== false) {
		throw new ChunkDecodeError(`${path}.underline`, 'expected true, false, "single" or "double"');
	}

	return c;
}

/** Decode a flat array of chunks. */
export function decodeChunks(value: unknown, path = "$"): Chunk[] {
	if (!Array.isArray(value)) throw new ChunkDecodeError(path, `expected an array of chunks, got ${describeValue(value)}`);
	return value.map((item, i) => decodeChunk(item, `${path}[${i}]`));
}

/** Decode an array of rows, each an array of chunks. Rows may differ in length. */
export function decodeRows(value: unknown, path = "$"): Chunk[][] {
	if (!Array.isArray(value)) throw new ChunkDecodeError(path, `expected an array of rows, got ${describeValue(value)}`);
	return value.map((row, i) => decodeChunks(row, `${path}[${i}]`));
}
