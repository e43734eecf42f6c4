/**
 * chunk-colour — HTTP render service (Hono-based).
 *
 * Lets tools that cannot link the library (shell scripts, other
 * runtimes) render chunk documents for a given terminal tier.
 *
 * Routes:
 *   POST /api/render?caps=<tier>   — Render a JSON chunk array
 *   POST /api/table?caps=<tier>    — Lay out and render a JSON rows document
 *   GET  /api/capabilities         — Known tiers and the service default
 *   GET  /health                   — Health check
 *
 * Rendered output is returned as `text/plain` with escape sequences intact.
 * @module
 */

import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { ALL_CAPABILITIES, TerminalCapabilities, capabilitiesName, parseCapabilities } from "./capabilities.js";
import { ChunkDecodeError, decodeChunks, decodeRows } from "./decode.js";
import { layoutAsTable } from "./layout.js";
import { renderChunksText } from "./render.js";

/** Options for {@link createServer}. */
export interface ServerOptions {
	/** Tier used when a request has no `caps` parameter (default: 24-bit). */
	defaultCapabilities?: TerminalCapabilities;
}

// ---------------------------------------------------------------------------
//  Server factory
// ---------------------------------------------------------------------------

/**
 * Create a Hono application serving the render routes.
 *
 * The returned app is not yet listening — call `serve()` or mount it
 * inside another Hono app to start accepting requests.
 */
export function createServer(options: ServerOptions = {}): Hono {
	const app = new Hono();
	const fallback = options.defaultCapabilities ?? TerminalCapabilities.With24BitColours;

	/** The tier for this request, or `undefined` if `?caps` is not a known tier. */
	const requestCapabilities = (value: string | undefined): TerminalCapabilities | undefined =>
		value === undefined ? fallback : parseCapabilities(value);

	// ── Rendering ────────────────────────────────────────────────────
	app.post("/api/render", async (ctx) => {
		const caps = requestCapabilities(ctx.req.query("caps"));
		if (caps === undefined) {
			return ctx.json({ error: `Unknown capabilities: "${ctx.req.query("caps")}"` }, 400);
		}
		const body: unknown = await ctx.req.json();
		return ctx.text(renderChunksText(caps, decodeChunks(body)));
	});

	app.post("/api/table", async (ctx) => {
		const caps = requestCapabilities(ctx.req.query("caps"));
		if (caps === undefined) {
			return ctx.json({ error: `Unknown capabilities: "${ctx.req.query("caps")}"` }, 400);
		}
		const body: unknown = await ctx.req.json();
		return ctx.text(renderChunksText(caps, layoutAsTable(decodeRows(body))));
	});

	// ── Metadata ─────────────────────────────────────────────────────
	app.get("/api/capabilities", (ctx) => {
		return ctx.json({
			default: capabilitiesName(fallback),
			capabilities: ALL_CAPABILITIES.map((tier) => ({ name: capabilitiesName(tier), rank: tier })),
		});
	});

	app.get("/health", (ctx) => ctx.json({ status: "ok" }));

	// ── Errors ───────────────────────────────────────────────────────
	app.onError((error, ctx) => {
		if (error instanceof ChunkDecodeError) {
			return ctx.json({ error: error.message, path: error.path }, 400);
		}
		if (error instanceof SyntaxError) {
			return ctx.json({ error: "Request body is not valid JSON" }, 400);
		}
		console.error(`Unhandled error on ${ctx.req.method} ${ctx.req.path}:`, error);
		return ctx.json({ error: "Internal server error" }, 500);
	});

	return app;
}

// ---------------------------------------------------------------------------
//  Standalone server
// ---------------------------------------------------------------------------

/**
 * Start listening on `port`.
 *
 * @param port    TCP port to bind (default 3000).
 * @param options Passed through to {@link createServer}.
 */
export function startServer(port = 3000, options: ServerOptions = {}): void {
	const app = createServer(options);

	console.log(`chunk-colour render service listening on http://localhost:${port}`);
	console.log(`  POST http://localhost:${port}/api/render`);
	console.log(`  POST http://localhost:${port}/api/table`);
	console.log(`  GET  http://localhost:${port}/api/capabilities`);
	console.log(`  GET  http://localhost:${port}/health`);

	serve({ fetch: app.fetch, port });
}
