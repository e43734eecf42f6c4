/**
 * chunk-colour — Chunk construction, styling and capability gating.
 *
 * Builders never validate against a terminal: asking for a 24-bit colour
 * is always legal and is simply dropped when rendering for a terminal
 * that cannot show it.
 * @module
 */

import { TerminalCapabilities, supports } from "./capabilities.js";
import type { SGR } from "./sgr.js";
import type { Chunk, ChunkLike, Colour, ConsoleLayer } from "./types.js";

// ---------------------------------------------------------------------------
//  Construction
// ---------------------------------------------------------------------------

/** Turn text into a chunk with no styling. */
export function chunk(text: string): Chunk {
	return { text };
}

/** Strings become plain chunks; chunks are returned as-is. */
export function toChunk(value: ChunkLike): Chunk {
	return typeof value === "string" ? chunk(value) : value;
}

// ---------------------------------------------------------------------------
//  Styling
//
//  Each builder copies the chunk with exactly one attribute replaced.
// ---------------------------------------------------------------------------

/** Set the foreground colour. */
export function fore(colour: Colour, value: ChunkLike): Chunk {
	return { ...toChunk(value), foreground: colour };
}

/** Set the background colour. */
export function back(colour: Colour, value: ChunkLike): Chunk {
	return { ...toChunk(value), background: colour };
}

/** Bold intensity, replacing faint if it was set. */
export function bold(value: ChunkLike): Chunk {
	return { ...toChunk(value), consoleIntensity: "bold" };
}

/** Faint intensity, replacing bold if it was set. */
export function faint(value: ChunkLike): Chunk {
	return { ...toChunk(value), consoleIntensity: "faint" };
}

/** Italic text. */
export function italic(value: ChunkLike): Chunk {
	return { ...toChunk(value), italic: true };
}

/** Single underline, replacing a double underline. */
export function underline(value: ChunkLike): Chunk {
	return { ...toChunk(value), underlining: "single" };
}

/** Double underline, replacing a single underline. */
export function doubleUnderline(value: ChunkLike): Chunk {
	return { ...toChunk(value), underlining: "double" };
}

// ---------------------------------------------------------------------------
//  Capability gating
// ---------------------------------------------------------------------------

/** The lowest tier at which a colour renders. */
export function colourCapability(colour: Colour): TerminalCapabilities {
	switch (colour.kind) {
		case "colour8":
			return TerminalCapabilities.With8Colours;
		case "colour8bit":
			return TerminalCapabilities.With8BitColours;
		case "colour24bit":
			return TerminalCapabilities.With24BitColours;
	}
}

/** True when `colour` cannot be shown at `tier` and so adds no styling. */
export function plainColour(tier: TerminalCapabilities, colour: Colour): boolean {
	return !supports(tier, colourCapability(colour));
}

/**
 * True when rendering `value` at `tier` needs no escape sequence at all.
 *
 * Every chunk is plain at {@link TerminalCapabilities.Plain}, so files and
 * pipes never receive escape bytes. Italic, underlining and intensity are
 * dropped there as well, not only colours; they do not render at every tier.
 * Above `Plain` they always render; colours only when the tier supports them.
 */
export function isPlain(tier: TerminalCapabilities, value: ChunkLike): boolean {
	if (tier === TerminalCapabilities.Plain) return true;
	const c = toChunk(value);
	return (
		c.italic === undefined &&
		c.consoleIntensity === undefined &&
		c.underlining === undefined &&
		(c.foreground === undefined || plainColour(tier, c.foreground)) &&
		(c.background === undefined || plainColour(tier, c.background))
	);
}

/** The SGR attribute for a colour on `layer`, or `undefined` if `tier` cannot show it. */
export function colourSGR(tier: TerminalCapabilities, layer: ConsoleLayer, colour: Colour): SGR | undefined {
	if (plainColour(tier, colour)) return undefined;
	switch (colour.kind) {
		case "colour8":
			return { kind: "colour", layer, intensity: colour.intensity, colour: colour.colour };
		case "colour8bit":
			return { kind: "colour8bit", layer, index: colour.index };
		case "colour24bit":
			return { kind: "colour24bit", layer, red: colour.red, green: colour.green, blue: colour.blue };
	}
}

/**
 * The attributes a chunk needs at `tier`, always in the order italic,
 * underlining, intensity, foreground, background. Empty at `Plain`.
 */
export function requiredSGR(tier: TerminalCapabilities, value: ChunkLike): SGR[] {
	if (tier === TerminalCapabilities.Plain) return [];
	const c = toChunk(value);
	const sgrs: SGR[] = [];

	if (c.italic !== undefined) sgrs.push({ kind: "italic", enabled: c.italic });
	if (c.underlining !== undefined) sgrs.push({ kind: "underlining", underlining: c.underlining });
	if (c.consoleIntensity !== undefined) sgrs.push({ kind: "intensity", intensity: c.consoleIntensity });

	const foreground = c.foreground && colourSGR(tier, "foreground", c.foreground);
	if (foreground) sgrs.push(foreground);
	const background = c.background && colourSGR(tier, "background", c.background);
	if (background) sgrs.push(background);

	return sgrs;
}
