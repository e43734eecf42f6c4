/**
 * chunk-colour — Terminal capability tiers.
 *
 * Tiers are ranked numbers so that gating is a plain comparison:
 * a feature renders when `active >= required`.
 *
 * Detection reads `NO_COLOR`, `TERM` and `COLORTERM`. Nothing else in
 * the library looks at the environment; renderers always take the tier
 * as an argument.
 * @module
 */

/** Capability tiers, lowest to highest. */
export const TerminalCapabilities = {
	Plain: 0,
	With8Colours: 1,
	With8BitColours: 2,
	With24BitColours: 3,
} as const;

export type TerminalCapabilities = (typeof TerminalCapabilities)[keyof typeof TerminalCapabilities];

/** Every tier in ascending order. */
export const ALL_CAPABILITIES: readonly TerminalCapabilities[] = [
	TerminalCapabilities.Plain,
	TerminalCapabilities.With8Colours,
	TerminalCapabilities.With8BitColours,
	TerminalCapabilities.With24BitColours,
];

const CAPABILITY_NAMES: Readonly<Record<TerminalCapabilities, string>> = {
	[TerminalCapabilities.Plain]: "plain",
	[TerminalCapabilities.With8Colours]: "8-colours",
	[TerminalCapabilities.With8BitColours]: "8bit-colours",
	[TerminalCapabilities.With24BitColours]: "24bit-colours",
};

/** Accepted spellings for {@link parseCapabilities}, on top of the canonical names. */
const CAPABILITY_ALIASES: Readonly<Record<string, TerminalCapabilities>> = {
	none: TerminalCapabilities.Plain,
	"8": TerminalCapabilities.With8Colours,
	"16": TerminalCapabilities.With8Colours,
	"256": TerminalCapabilities.With8BitColours,
	"8bit": TerminalCapabilities.With8BitColours,
	"24bit": TerminalCapabilities.With24BitColours,
	truecolor: TerminalCapabilities.With24BitColours,
	truecolour: TerminalCapabilities.With24BitColours,
};

/** Whether a feature requiring `required` renders under `active`. */
export function supports(active: TerminalCapabilities, required: TerminalCapabilities): boolean {
	return active >= required;
}

/** Stable name of a tier, e.g. `"8bit-colours"`. */
export function capabilitiesName(tier: TerminalCapabilities): string {
	return CAPABILITY_NAMES[tier];
}

/**
 * Parse a tier from user input (a CLI flag or query parameter).
 * Case-insensitive; returns `undefined` for anything unrecognised.
 */
export function parseCapabilities(value: string): TerminalCapabilities | undefined {
	const needle = value.trim().toLowerCase();
	const byName = ALL_CAPABILITIES.find((tier) => CAPABILITY_NAMES[tier] === needle);
	if (byName !== undefined) return byName;
	return Object.hasOwn(CAPABILITY_ALIASES, needle) ? CAPABILITY_ALIASES[needle] : undefined;
}

/**
 * Work out the tier from environment variables alone.
 *
 * 1. `NO_COLOR` set to anything non-empty → plain (https://no-color.org/)
 * 2. `TERM` missing, empty or `dumb` → plain
 * 3. `COLORTERM` of `truecolor` / `24bit` → 24-bit
 * 4. `TERM` mentioning `256` → 8-bit
 * 5. otherwise → 8 colours
 */
export function detectCapabilitiesFromEnv(env: NodeJS.ProcessEnv = process.env): TerminalCapabilities {
	if (env.NO_COLOR) return TerminalCapabilities.Plain;

	const term = env.TERM;
	if (!term || term === "dumb") return TerminalCapabilities.Plain;

	const colorTerm = env.COLORTERM?.toLowerCase();
	if (colorTerm === "truecolor" || colorTerm === "24bit") return TerminalCapabilities.With24BitColours;

	if (term.includes("256")) return TerminalCapabilities.With8BitColours;
	return TerminalCapabilities.With8Colours;
}

/**
 * Work out the tier for a specific output stream.
 * Anything that is not a TTY (files, pipes) gets plain output.
 */
export function detectCapabilities(
	stream: { readonly isTTY?: boolean },
	env: NodeJS.ProcessEnv = process.env,
): TerminalCapabilities {
	if (stream.isTTY !== true) return TerminalCapabilities.Plain;
	return detectCapabilitiesFromEnv(env);
}
