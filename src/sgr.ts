/**
 * chunk-colour — SGR (Select Graphic Rendition) attributes and their
 * serialisation into CSI escape sequences.
 *
 * Only the `m` final byte is produced here; cursor movement and other
 * control sequences are out of scope.
 * @module
 */

import { TERMINAL_COLOURS } from "./colours.js";
import type { ColourIntensity, ConsoleIntensity, ConsoleLayer, TerminalColour, Underlining } from "./types.js";

/** Control Sequence Introducer: ESC followed by `[`. */
export const CSI = "\x1b[";

/** The full reset emitted after every styled chunk. */
export const RESET_SEQUENCE = `${CSI}0m`;

/** A single graphic rendition attribute. */
export type SGR =
	| { readonly kind: "reset" }
	| { readonly kind: "italic"; readonly enabled: boolean }
	| { readonly kind: "underlining"; readonly underlining: Underlining }
	| { readonly kind: "intensity"; readonly intensity: ConsoleIntensity }
	| { readonly kind: "colour"; readonly layer: ConsoleLayer; readonly intensity: ColourIntensity; readonly colour: TerminalColour }
	| { readonly kind: "colour8bit"; readonly layer: ConsoleLayer; readonly index: number }
	| { readonly kind: "colour24bit"; readonly layer: ConsoleLayer; readonly red: number; readonly green: number; readonly blue: number };

/** `38` selects an extended foreground colour, `48` an extended background. */
function extendedColourParameter(layer: ConsoleLayer): number {
	return layer === "foreground" ? 38 : 48;
}

/** Base code of a classic colour on the given layer and intensity. */
function colourBase(layer: ConsoleLayer, intensity: ColourIntensity): number {
	if (layer === "foreground") return intensity === "dull" ? 30 : 90;
	return intensity === "dull" ? 40 : 100;
}

/**
 * The numeric parameters for one attribute.
 *
 * @example
 * ```ts
 * sgrParameters({ kind: "colour8bit", layer: "background", index: 42 }); // [48, 5, 42]
 * ```
 */
export function sgrParameters(sgr: SGR): number[] {
	switch (sgr.kind) {
		case "reset":
			return [0];
		case "italic":
			return [sgr.enabled ? 3 : 23];
		case "underlining":
			return [sgr.underlining === "single" ? 4 : 21];
		case "intensity":
			return [sgr.intensity === "bold" ? 1 : 2];
		case "colour":
			return [colourBase(sgr.layer, sgr.intensity) + TERMINAL_COLOURS.indexOf(sgr.colour)];
		case "colour8bit":
			return [extendedColourParameter(sgr.layer), 5, sgr.index];
		case "colour24bit":
			return [extendedColourParameter(sgr.layer), 2, sgr.red, sgr.green, sgr.blue];
	}
}

/**
 * Serialise attributes into one CSI sequence, parameters joined by `;`.
 *
 * @example
 * ```ts
 * renderCSI([{ kind: "intensity", intensity: "bold" }, { kind: "italic", enabled: true }]); // "\x1b[1;3m"
 * ```
 */
export function renderCSI(sgrs: readonly SGR[]): string {
	return `${CSI}${sgrs.flatMap(sgrParameters).join(";")}m`;
}
