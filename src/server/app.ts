import { type Context, Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { Adoptly } from "../core/adoptly";
import { listModels } from "../core/registry";
import { type AdoptlyError, ErrorCodes } from "../types/common";

/**
 * HTTP surface for Adoptly.
 *
 * Endpoints:
 * - GET  /           - Welcome message
 * - GET  /test       - Store diagnostics (never fails)
 * - GET  /schema     - Registered entity models
 * - POST /seed       - Insert starter pets into an empty store
 * - GET  /api/pets   - Search adoptable pets (`species`, `size`, `q`)
 * - POST /api/adopt  - Submit an adoption request (`pet_id` required)
 *
 * Errors are returned as `{ detail, code }`.
 */

export interface AppOptions {
	/** Log one line per request via `hono/logger` (default: true). */
	logRequests?: boolean;
}

/** HTTP status for an error code. */
export function statusForError(code: string): 400 | 404 | 422 | 500 {
	switch (code) {
		case ErrorCodes.INVALID_PET_ID:
			return 400;
		case ErrorCodes.PET_NOT_FOUND:
			return 404;
		case ErrorCodes.INVALID_REQUEST:
			return 422;
		default:
			return 500;
	}
}

function errorResponse(c: Context, error: AdoptlyError | undefined) {
	const code = error?.code ?? ErrorCodes.UNKNOWN;
	return c.json(
		{ detail: error?.message ?? "Internal error", code },
		statusForError(code),
	);
}

export function createApp(service: Adoptly, options: AppOptions = {}): Hono {
	const app = new Hono();

	app.use("*", cors());
	if (options.logRequests ?? true) app.use("*", logger());

	app.get("/", (c) => c.json({ message: "Welcome to the Adoptly API" }));

	// Diagnostics fold every failure into the body, so this is always a 200.
	app.get("/test", async (c) => c.json(await service.diagnostics.reportStatus()));

	app.get("/schema", (c) => c.json({ models: listModels() }));

	app.post("/seed", async (c) => {
		const res = await service.seeder.seedIfEmpty();
		if (res.error || !res.result) return errorResponse(c, res.error);
		return c.json({
			message: res.result.alreadySeeded ? "Already seeded" : "Seeded",
			count: res.result.count,
		});
	});

	app.get("/api/pets", async (c) => {
		const res = await service.catalog.listPets({
			species: c.req.query("species"),
			size: c.req.query("size"),
			q: c.req.query("q"),
		});
		if (res.error || !res.result) return errorResponse(c, res.error);
		return c.json(res.result);
	});

	app.post("/api/adopt", async (c) => {
		const body: unknown = await c.req.json().catch(() => undefined);
		const res = await service.adoptions.submitRequest(body);
		if (res.error || !res.result) return errorResponse(c, res.error);
		return c.json({
			message: "Request received",
			request_id: res.result.requestId,
		});
	});

	return app;
}
