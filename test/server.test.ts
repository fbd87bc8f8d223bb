/**
 * Tests for the Hono HTTP API server.
 *
 * Exercises every route exposed by {@link createServer} through Hono's
 * built-in `app.request()` helper, so no real HTTP listener is required.
 * Providers are scripted in-process fakes.
 * @module
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TickerClient } from "../src/client.js";
import { MessageCache } from "../src/message-cache.js";
import { PluginManager } from "../src/plugins/manager.js";
import { PromptManager } from "../src/prompts.js";
import { createServer } from "../src/server.js";
import type { ProviderConfig } from "../src/types.js";
import { fakeLog, fakePlugin } from "./fakes.js";

// ---------------------------------------------------------------------------
//  Test helpers
// ---------------------------------------------------------------------------

let tempDir: string;

beforeEach(async () => {
	tempDir = await mkdtemp(join(tmpdir(), "ticker-server-test-"));
	fakeLog.length = 0;
});

afterEach(async () => {
	await rm(tempDir, { recursive: true, force: true });
});

function fake(name: string, extraParams: Record<string, unknown> = {}): ProviderConfig {
	return { name, plugin: "fake", extraParams };
}

/** Build an app over a client with the given providers and pre-cached messages. */
async function buildApp(providers: ProviderConfig[], cached: string[] = []): Promise<{ app: Hono; client: TickerClient }> {
	const manager = new PluginManager({ builtins: { fake: fakePlugin() } });
	const cache = await MessageCache.open(
		{ file: join(tempDir, "cache.json"), maxSize: 200, lastLimit: 1 },
		{ random: () => 0 },
	);
	for (const text of cached) {
		await cache.add(text);
	}
	const client = await TickerClient.create(
		{
			providers,
			strategy: "priority",
			fuzzyThreshold: 85,
			cacheProbability: 0,
			cache: cache.settings,
			timeout: 30,
			promptsFile: join(tempDir, "prompts.json"),
			promptProfile: "default",
			port: 0,
		},
		{ manager, cache, random: () => 0 },
	);
	const prompts = new PromptManager("default", { system: "Be brief.", user: "Say something." });
	return { app: createServer(client, prompts), client };
}

// ---------------------------------------------------------------------------
//  GET /api/message
// ---------------------------------------------------------------------------

describe("GET /api/message", () => {
	it("returns a freshly generated message", async () => {
		const { app, client } = await buildApp([fake("A", { reply: "Server fact." })]);

		const res = await app.request("/api/message");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ message: "Server fact.", source: "provider" });
		expect(client.getCache().has("Server fact.")).toBe(true);
	});

	it("falls back to an archived message when providers fail", async () => {
		const { app } = await buildApp([fake("A")], ["archived", "newest"]);

		const res = await app.request("/api/message");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ message: "archived", source: "archive" });
	});

	it("rejects provider text that duplicates a cached message", async () => {
		const { app } = await buildApp([fake("A", { reply: "Known already." })], ["Known already."]);

		const res = await app.request("/api/message");

		expect(await res.json()).toEqual({ message: "Known already.", source: "archive" });
		expect(fakeLog).toEqual(["initialize:A", "generate:A"]);
	});

	it("returns 503 when nothing is available", async () => {
		const { app } = await buildApp([fake("A")]);

		const res = await app.request("/api/message");

		expect(res.status).toBe(503);
		expect(await res.json()).toEqual({ error: "No message available; check provider configuration" });
	});
});

// ---------------------------------------------------------------------------
//  Status routes
// ---------------------------------------------------------------------------

describe("GET /api/health", () => {
	it("is healthy when any provider is", async () => {
		const { app } = await buildApp([fake("A"), fake("B", { healthy: false })], ["one"]);

		const res = await app.request("/api/health");
		const body = await res.json();

		expect(res.status).toBe(200);
		expect(body).toEqual({
			status: "healthy",
			providers: { A: true, B: false },
			cacheSize: 1,
			timestamp: expect.any(Number),
		});
	});

	it("is degraded when none is", async () => {
		const { app } = await buildApp([fake("A", { initFails: true })]);

		const body = await (await app.request("/api/health")).json();

		expect(body).toMatchObject({ status: "degraded", providers: { A: false }, cacheSize: 0 });
	});
});

describe("GET /api/plugins", () => {
	it("lists registered plugins with a validation report", async () => {
		const { app } = await buildApp([fake("A")]);

		const body = await (await app.request("/api/plugins")).json();

		expect(body).toMatchObject({
			count: 1,
			plugins: [{ name: "fake", providerClass: "FakeProvider", enabled: true }],
			validation: { valid: ["fake"], invalid: [] },
		});
	});
});

describe("GET /api/providers", () => {
	it("lists active providers and their descriptions", async () => {
		const { app } = await buildApp([fake("A")]);

		const body = await (await app.request("/api/providers")).json();

		expect(body).toMatchObject({
			available: ["A"],
			info: { A: { name: "Fake", configName: "A", model: "fake-1" } },
		});
	});
});

// ---------------------------------------------------------------------------
//  POST /api/providers/reload
// ---------------------------------------------------------------------------

describe("POST /api/providers/reload", () => {
	it("rebuilds the provider set", async () => {
		const { app, client } = await buildApp([fake("A", { initFails: true })]);
		await client.healthCheckAll();
		expect(client.getAvailableProviders()).toEqual([]);

		const res = await app.request("/api/providers/reload", { method: "POST" });
		const body = await res.json();

		expect(res.status).toBe(200);
		expect(body).toEqual({ status: "ok", available: ["A"], reloadedAt: expect.any(Number) });
	});

	it("is not reachable with GET", async () => {
		const { app } = await buildApp([]);
		expect((await app.request("/api/providers/reload")).status).toBe(404);
	});
});

// ---------------------------------------------------------------------------
//  Liveness
// ---------------------------------------------------------------------------

describe("GET /health", () => {
	it("reports ok with uptime", async () => {
		const { app } = await buildApp([]);

		const body = await (await app.request("/health")).json();

		expect(body).toEqual({ status: "ok", uptime: expect.any(Number) });
	});
});
