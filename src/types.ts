/**
 * chunk-colour — Core type definitions.
 *
 * Chunks and colours are plain immutable values; every builder in
 * `chunk.ts` returns a fresh object rather than mutating its input.
 * @module
 */

/** The eight classic terminal colour names, in SGR index order. */
export type TerminalColour = "black" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white";

/** Dull colours use the 30–37 / 40–47 codes, bright ones 90–97 / 100–107. */
export type ColourIntensity = "dull" | "bright";

/** Bold and faint are mutually exclusive; the last one set wins. */
export type ConsoleIntensity = "bold" | "faint";

/** Single and double underline are mutually exclusive. */
export type Underlining = "single" | "double";

/** Which plane a colour applies to. */
export type ConsoleLayer = "foreground" | "background";

/**
 * A colour in one of the three palettes a terminal may support.
 *
 * Each variant only renders when the active tier reaches its minimum:
 * - `colour8`     — {@link TerminalCapabilities.With8Colours}
 * - `colour8bit`  — {@link TerminalCapabilities.With8BitColours}
 * - `colour24bit` — {@link TerminalCapabilities.With24BitColours}
 */
export type Colour =
	| { readonly kind: "colour8"; readonly intensity: ColourIntensity; readonly colour: TerminalColour }
	| { readonly kind: "colour8bit"; readonly index: number }
	| { readonly kind: "colour24bit"; readonly red: number; readonly green: number; readonly blue: number };

/**
 * An immutable run of text plus the styling attributes it carries.
 *
 * Unset attributes are simply absent. `italic` is only ever set to `true`
 * by the builders.
 */
export interface Chunk {
	/** The text to render. May be empty. */
	readonly text: string;
	readonly italic?: boolean;
	readonly consoleIntensity?: ConsoleIntensity;
	readonly underlining?: Underlining;
	readonly foreground?: Colour;
	readonly background?: Colour;
}

/** Anything accepted where a chunk is expected: strings become plain chunks. */
export type ChunkLike = Chunk | string;

/**
 * A grid of chunks laid out by {@link renderTable}.
 * Every row must have the same length; use `padRows` to get there.
 */
export interface Table {
	/** A list of rows, each a list of cells. */
	readonly cells: readonly (readonly Chunk[])[];
}

/**
 * The output side of rendering: anything that accepts bytes in order
 * and reports completion. `process.stdout` and any Node writable fit.
 */
export interface ByteSink {
	write(bytes: Uint8Array, callback: (error?: Error | null) => void): boolean;
}
