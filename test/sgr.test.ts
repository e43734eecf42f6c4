import { describe, expect, it } from "vitest";
import { CSI, RESET_SEQUENCE, renderCSI, sgrParameters } from "../src/sgr.js";

describe("sgrParameters", () => {
	it("encodes reset and text attributes", () => {
		expect(sgrParameters({ kind: "reset" })).toEqual([0]);
		expect(sgrParameters({ kind: "italic", enabled: true })).toEqual([3]);
		expect(sgrParameters({ kind: "italic", enabled: false })).toEqual([23]);
		expect(sgrParameters({ kind: "underlining", underlining: "single" })).toEqual([4]);
		expect(sgrParameters({ kind: "underlining", underlining: "double" })).toEqual([21]);
		expect(sgrParameters({ kind: "intensity", intensity: "bold" })).toEqual([1]);
		expect(sgrParameters({ kind: "intensity", intensity: "faint" })).toEqual([2]);
	});

	it("uses 30-37 and 40-47 for dull colours", () => {
		expect(sgrParameters({ kind: "colour", layer: "foreground", intensity: "dull", colour: "black" })).toEqual([30]);
		expect(sgrParameters({ kind: "colour", layer: "foreground", intensity: "dull", colour: "red" })).toEqual([31]);
		expect(sgrParameters({ kind: "colour", layer: "foreground", intensity: "dull", colour: "white" })).toEqual([37]);
		expect(sgrParameters({ kind: "colour", layer: "background", intensity: "dull", colour: "black" })).toEqual([40]);
		expect(sgrParameters({ kind: "colour", layer: "background", intensity: "dull", colour: "cyan" })).toEqual([46]);
	});

	it("uses 90-97 and 100-107 for bright colours", () => {
		expect(sgrParameters({ kind: "colour", layer: "foreground", intensity: "bright", colour: "red" })).toEqual([91]);
		expect(sgrParameters({ kind: "colour", layer: "foreground", intensity: "bright", colour: "magenta" })).toEqual([95]);
		expect(sgrParameters({ kind: "colour", layer: "background", intensity: "bright", colour: "white" })).toEqual([107]);
	});

	it("encodes 8-bit colours", () => {
		expect(sgrParameters({ kind: "colour8bit", layer: "foreground", index: 200 })).toEqual([38, 5, 200]);
		expect(sgrParameters({ kind: "colour8bit", layer: "background", index: 0 })).toEqual([48, 5, 0]);
	});

	it("encodes 24-bit colours", () => {
		expect(sgrParameters({ kind: "colour24bit", layer: "foreground", red: 10, green: 20, blue: 30 })).toEqual([38, 2, 10, 20, 30]);
		expect(sgrParameters({ kind: "colour24bit", layer: "background", red: 255, green: 0, blue: 1 })).toEqual([48, 2, 255, 0, 1]);
	});
});

describe("renderCSI", () => {
	it("starts with ESC [", () => {
		expect(CSI).toBe("\x1b[");
		expect(CSI.charCodeAt(0)).toBe(0x1b);
		expect(CSI.charCodeAt(1)).toBe(0x5b);
	});

	it("renders the reset sequence", () => {
		expect(renderCSI([{ kind: "reset" }])).toBe("\x1b[0m");
		expect(RESET_SEQUENCE).toBe("\x1b[0m");
	});

	it("joins several attributes into one sequence", () => {
		const csi = renderCSI([
			{ kind: "intensity", intensity: "bold" },
			{ kind: "colour24bit", layer: "foreground", red: 10, green: 20, blue: 30 },
		]);
		expect(csi).toBe("\x1b[1;38;2;10;20;30m");
	});

	it("keeps attribute order", () => {
		const csi = renderCSI([
			{ kind: "italic", enabled: true },
			{ kind: "underlining", underlining: "double" },
			{ kind: "colour8bit", layer: "background", index: 42 },
		]);
		expect(csi).toBe("\x1b[3;21;48;5;42m");
	});
});
