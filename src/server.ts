/**
 * snippet-ticker — HTTP API server (Hono-based).
 *
 * A thin JSON layer over {@link TickerClient} for the dashboard front end.
 *
 * Routes:
 *   GET  /api/message           — Next message ({ message, source })
 *   GET  /api/health            — Provider health, cache size
 *   GET  /api/plugins           — Registered plugins + validation report
 *   GET  /api/providers         — Active providers and their descriptions
 *   POST /api/providers/reload  — Rebuild the active provider set
 *   GET  /health                — Liveness
 * @module
 */

import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { TickerClient } from "./client.js";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { PromptManager } from "./prompts.js";
import type { TickerConfig } from "./types.js";

const log = createLogger("server");

// ---------------------------------------------------------------------------
//  Server factory
// ---------------------------------------------------------------------------

/**
 * Create a Hono application wired to the given client and prompts.
 *
 * The returned app is not yet listening — call `serve()` or mount it
 * inside another Hono app to start accepting requests.
 */
export function createServer(client: TickerClient, prompts: PromptManager): Hono {
	const app = new Hono();

	// ── Message route ────────────────────────────────────────────────
	//
	// New provider text is checked against every cached message. When no
	// provider delivers, any cached message is served as "archive"; with an
	// empty cache the request fails with 503.
	app.get("/api/message", async (ctx) => {
		try {
			const result = await client.requestMessage(prompts.systemPrompt, prompts.userPrompt, [], undefined, {
				checkWholeCache: true,
			}) ?? await client.archiveMessage();

			if (!result) {
				return ctx.json({ error: "No message available; check provider configuration" }, 503);
			}
			return ctx.json({ message: result.message, source: result.source });
		} catch (err: unknown) {
			log.error(`Error generating message: ${describeError(err)}`);
			return ctx.json({ error: "Error generating message", message: describeError(err) }, 500);
		}
	});

	// ── Status routes ────────────────────────────────────────────────
	app.get("/api/health", async (ctx) => {
		const providers = await client.healthCheckAll();
		const healthy = Object.values(providers).some(Boolean);
		return ctx.json({
			status: healthy ? "healthy" : "degraded",
			providers,
			cacheSize: client.getCache().size,
			timestamp: Date.now(),
		});
	});

	app.get("/api/plugins", (ctx) => {
		const manager = client.getManager();
		const plugins = manager.getPluginList();
		return ctx.json({
			plugins,
			count: plugins.length,
			validation: manager.getRegistry().validateRegistry(),
		});
	});

	app.get("/api/providers", (ctx) => {
		return ctx.json({
			available: client.getAvailableProviders(),
			info: client.getProviderInfo(),
		});
	});

	// ── Mutation routes ──────────────────────────────────────────────
	app.post("/api/providers/reload", async (ctx) => {
		try {
			await client.reloadProviders();
			return ctx.json({
				status: "ok",
				available: client.getAvailableProviders(),
				reloadedAt: Date.now(),
			});
		} catch (err: unknown) {
			return ctx.json({ error: "Reload failed", message: describeError(err) }, 500);
		}
	});

	// ── Liveness ─────────────────────────────────────────────────────
	app.get("/health", (ctx) => {
		return ctx.json({
			status: "ok",
			uptime: process.uptime(),
		});
	});

	return app;
}

// ---------------------------------------------------------------------------
//  Standalone server entry point
// ---------------------------------------------------------------------------

/**
 * Boot a standalone ticker API server: build the client, resolve prompts,
 * then listen on `config.port`.
 */
export async function startServer(config: TickerConfig): Promise<void> {
	const client = await TickerClient.create(config);
	const prompts = await PromptManager.load(config);

	log.info(`System prompt: "${prompts.systemPrompt.slice(0, 70)}"`);
	log.info(`User prompt: "${prompts.userPrompt.slice(0, 70)}"`);

	const app = createServer(client, prompts);

	log.info(`Ticker API server listening on http://localhost:${config.port}`);
	log.info(`  GET  http://localhost:${config.port}/api/message`);
	log.info(`  GET  http://localhost:${config.port}/api/health`);
	log.info(`  GET  http://localhost:${config.port}/api/plugins`);
	log.info(`  GET  http://localhost:${config.port}/api/providers`);

	serve({ fetch: app.fetch, port: config.port });
}
