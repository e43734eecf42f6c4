/**
 * chunk-colour — Colour constructors.
 *
 * The sixteen classic colours, the 256-entry palette and 24-bit RGB.
 * The American spellings (`color256`, `colorRGB`) are plain aliases.
 * @module
 */

import type { Colour, ColourIntensity, TerminalColour } from "./types.js";

/** The eight terminal colours in SGR index order (black = 0 … white = 7). */
export const TERMINAL_COLOURS: readonly TerminalColour[] = [
	"black",
	"red",
	"green",
	"yellow",
	"blue",
	"magenta",
	"cyan",
	"white",
];

function assertByte(value: number, label: string): number {
	if (!Number.isInteger(value) || value < 0 || value > 255) {
		throw new RangeError(`${label} must be an integer between 0 and 255, got ${value}`);
	}
	return value;
}

/** Build one of the sixteen classic colours. */
export function colour8(intensity: ColourIntensity, colour: TerminalColour): Colour {
	return { kind: "colour8", intensity, colour };
}

// ── Dull ──
export const black = colour8("dull", "black");
export const red = colour8("dull", "red");
export const green = colour8("dull", "green");
export const yellow = colour8("dull", "yellow");
export const blue = colour8("dull", "blue");
export const magenta = colour8("dull", "magenta");
export const cyan = colour8("dull", "cyan");
export const white = colour8("dull", "white");

// ── Bright ──
export const brightBlack = colour8("bright", "black");
export const brightRed = colour8("bright", "red");
export const brightGreen = colour8("bright", "green");
export const brightYellow = colour8("bright", "yellow");
export const brightBlue = colour8("bright", "blue");
export const brightMagenta = colour8("bright", "magenta");
export const brightCyan = colour8("bright", "cyan");
export const brightWhite = colour8("bright", "white");

/**
 * An entry of the 256-colour palette.
 * Not rendered below `With8BitColours`.
 *
 * @throws RangeError when `index` is not an integer in 0–255.
 */
export function colour256(index: number): Colour {
	return { kind: "colour8bit", index: assertByte(index, "Palette index") };
}

/** Alias for {@link colour256}. */
export const color256 = colour256;

/**
 * A 24-bit RGB colour.
 * Not rendered below `With24BitColours`.
 *
 * @throws RangeError when any channel is not an integer in 0–255.
 */
export function colourRGB(red: number, green: number, blue: number): Colour {
	return {
		kind: "colour24bit",
		red: assertByte(red, "Red channel"),
		green: assertByte(green, "Green channel"),
		blue: assertByte(blue, "Blue channel"),
	};
}

/** Alias for {@link colourRGB}. */
export const colorRGB = colourRGB;
