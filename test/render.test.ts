/**
 * Tests for chunk rendering and sink output.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { ALL_CAPABILITIES, TerminalCapabilities } from "../src/capabilities.js";
import { back, bold, chunk, doubleUnderline, faint, fore, isPlain, italic, underline } from "../src/chunk.js";
import { brightRed, colour256, colourRGB, green, red } from "../src/colours.js";
import {
	putChunksWith,
	renderChunk,
	renderChunkText,
	renderChunks,
	renderChunksText,
	writeChunksWith,
} from "../src/render.js";
import type { Chunk } from "../src/types.js";
import { collectingSink, failingSink } from "./sink.js";

const { Plain, With8Colours, With8BitColours, With24BitColours } = TerminalCapabilities;

const samples: Chunk[] = [
	chunk("plain"),
	bold("bold"),
	faint(italic("faint italic")),
	doubleUnderline(fore(brightRed, "double")),
	back(colour256(200), fore(green, "palette")),
	fore(colourRGB(10, 20, 30), "rgb"),
	underline(back(colourRGB(1, 2, 3), "héllo ✓")),
	chunk(""),
];

describe("renderChunk", () => {
	it("renders bold 24-bit text as one sequence plus a reset", () => {
		const bytes = renderChunk(With24BitColours, bold(fore(colourRGB(10, 20, 30), chunk("hi"))));
		expect(bytes).toEqual(Buffer.from("\x1b[1;38;2;10;20;30mhi\x1b[0m", "utf8"));
	});

	it("drops colour entirely at the plain tier", () => {
		expect(renderChunk(Plain, fore(red, chunk("x")))).toEqual(Buffer.from("x"));
	});

	it("emits only the text at the plain tier, whatever the styling", () => {
		for (const c of samples) {
			expect(renderChunk(Plain, c)).toEqual(Buffer.from(c.text, "utf8"));
		}
	});

	it("brackets every non-plain chunk with a CSI sequence and a reset", () => {
		for (const tier of ALL_CAPABILITIES) {
			for (const c of samples) {
				if (isPlain(tier, c)) continue;
				const text = renderChunkText(tier, c);
				expect(text.startsWith("\x1b[")).toBe(true);
				expect(text.startsWith("\x1b[m")).toBe(false);
				expect(text.endsWith("\x1b[0m")).toBe(true);
			}
		}
	});

	it("uses bright codes for bright colours", () => {
		expect(renderChunkText(With8Colours, fore(brightRed, "x"))).toBe("\x1b[91mx\x1b[0m");
	});

	it("keeps text attributes when the colour is unsupported", () => {
		expect(renderChunkText(With8Colours, fore(colour256(200), bold("x")))).toBe("\x1b[1mx\x1b[0m");
	});

	it("renders palette colours at the 8-bit tier", () => {
		expect(renderChunkText(With8BitColours, back(colour256(42), "x"))).toBe("\x1b[48;5;42mx\x1b[0m");
	});

	it("renders an unsupported colour as plain text", () => {
		expect(renderChunkText(With8BitColours, fore(colourRGB(1, 2, 3), "x"))).toBe("x");
	});

	it("styles empty text", () => {
		expect(renderChunkText(With8Colours, bold(""))).toBe("\x1b[1m\x1b[0m");
		expect(renderChunkText(With8Colours, "")).toBe("");
	});

	it("encodes text as UTF-8", () => {
		expect([...renderChunk(With8Colours, "é")]).toEqual([0xc3, 0xa9]);
	});
});

describe("renderChunks", () => {
	it("concatenates chunks with no separators", () => {
		expect(renderChunksText(With8Colours, ["a", bold("b"), "c"])).toBe("a\x1b[1mb\x1b[0mc");
	});

	it("equals the byte concatenation of each chunk", () => {
		for (const tier of ALL_CAPABILITIES) {
			for (const first of samples) {
				for (const second of samples) {
					const expected = Buffer.concat([renderChunk(tier, first), renderChunk(tier, second)]);
					expect(renderChunks(tier, [first, second])).toEqual(expected);
				}
			}
		}
	});

	it("encodes each chunk on its own", () => {
		// A surrogate pair split across chunks is two lone surrogates, not one emoji.
		const bytes = renderChunks(Plain, ["\ud83d", "\ude00"]);
		expect(bytes).toEqual(Buffer.concat([renderChunk(Plain, "\ud83d"), renderChunk(Plain, "\ude00")]));
	});

	it("accepts any iterable", () => {
		function* chunks(): Generator<Chunk> {
			yield chunk("x");
			yield bold("y");
		}
		expect(renderChunksText(With8Colours, chunks())).toBe("x\x1b[1my\x1b[0m");
	});

	it("renders nothing for no chunks", () => {
		expect(renderChunks(With24BitColours, [])).toEqual(Buffer.alloc(0));
	});
});

describe("writeChunksWith", () => {
	it("writes the rendered bytes in one write", async () => {
		const sink = collectingSink();
		await writeChunksWith(With8Colours, sink, ["a", fore(red, "b")]);
		expect(sink.writes).toHaveLength(1);
		expect(sink.text()).toBe("a\x1b[31mb\x1b[0m");
	});

	it("rejects with the sink's error", async () => {
		const error = new Error("EPIPE");
		await expect(writeChunksWith(With8Colours, failingSink(error), ["a"])).rejects.toBe(error);
	});
});

describe("putChunksWith", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes to stdout", async () => {
		const written: string[] = [];
		vi.spyOn(process.stdout, "write").mockImplementation((data: unknown, ...rest: unknown[]) => {
			if (data instanceof Uint8Array) written.push(Buffer.from(data).toString("utf8"));
			const callback = rest.find((arg): arg is () => void => typeof arg === "function");
			callback?.();
			return true;
		});

		await putChunksWith(With8Colours, [underline("u")]);
		expect(written).toEqual(["\x1b[4mu\x1b[0m"]);
	});
});
