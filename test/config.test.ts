import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, providersFromEnv } from "../src/config.js";
import { TickerError } from "../src/errors.js";

describe("loadConfig", () => {
	let tempDir: string;
	let configFile: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), "ticker-config-test-"));
		configFile = join(tempDir, "ticker.config.json");
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	async function writeConfig(data: unknown): Promise<void> {
		await writeFile(configFile, JSON.stringify(data));
	}

	it("applies defaults for everything", async () => {
		await writeConfig({});

		expect(await loadConfig({}, undefined, { configFile })).toEqual({
			providers: [],
			strategy: "priority",
			fuzzyThreshold: 85,
			cacheProbability: 0.6,
			cache: { file: "message_cache.json", maxSize: 200, lastLimit: 3 },
			timeout: 30,
			pluginDirectory: undefined,
			pluginSettingsFile: undefined,
			promptsFile: "prompts.json",
			promptProfile: "default",
			systemPrompt: undefined,
			userPrompt: undefined,
			port: 3000,
		});
	});

	it("requires an explicitly named file to exist", async () => {
		const missing = join(tempDir, "absent.json");

		const error = await loadConfig({}, undefined, { configFile: missing }).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(TickerError);
		expect(error).toMatchObject({ kind: "config", message: `Config file not found: ${missing}` });
	});

	it("enables built-in providers whose key is set, in default order", async () => {
		await writeConfig({});
		const loaded = await loadConfig({ GROQ_API_KEY: "test-secret", OPENROUTER_API_KEY: "test-secret" }, undefined, { configFile });
		expect(loaded.providers).toEqual([
			{ name: "openrouter", plugin: "openrouter", apiKey: "test-secret" },
			{ name: "groq", plugin: "groq", apiKey: "test-secret" },
		]);
	});

	it("moves providers named in PROVIDER_ORDER to the front", async () => {
		await writeConfig({});
		const config = await loadConfig(
			{
				OPENROUTER_API_KEY: "test-secret",
				TOGETHER_API_KEY: "test-secret",
				GROQ_API_KEY: "test-secret",
				PROVIDER_ORDER: "groq, together",
			},
			undefined,
			{ configFile },
		);

		expect(config.providers.map((p) => p.name)).toEqual(["groq", "together", "openrouter"]);
	});

	it("coerces numeric settings from the environment", async () => {
		await writeConfig({});
		const config = await loadConfig(
			{
				FUZZY_THRESHOLD: "90",
				CACHE_PROBABILITY: "0.25",
				MAX_CACHE_SIZE: "50",
				LAST_LIMIT: "5",
				API_TIMEOUT: "10",
				PORT: "8080",
				PROVIDER_STRATEGY: "random",
				CACHE_FILE: "/var/lib/ticker/cache.json",
			},
			undefined,
			{ configFile },
		);

		expect(config).toMatchObject({
			fuzzyThreshold: 90,
			cacheProbability: 0.25,
			cache: { file: "/var/lib/ticker/cache.json", maxSize: 50, lastLimit: 5 },
			timeout: 10,
			port: 8080,
			strategy: "random",
		});
	});

	it("layers file, then environment, then overrides", async () => {
		await writeConfig({ fuzzyThreshold: 70, cacheProbability: 0.1, lastLimit: 4 });

		const config = await loadConfig({ FUZZY_THRESHOLD: "80", LAST_LIMIT: "6" }, { fuzzyThreshold: 95 }, { configFile });

		expect(config.fuzzyThreshold).toBe(95);
		expect(config.cacheProbability).toBe(0.1);
		expect(config.cache.lastLimit).toBe(6);
	});

	it("lets an explicit provider entry borrow the key from the environment", async () => {
		await writeConfig({ providers: [{ name: "openrouter", model: "vendor/model-x" }] });

		const config = await loadConfig({ OPENROUTER_API_KEY: "test-secret" }, undefined, { configFile });

		expect(config.providers).toEqual([{ name: "openrouter", model: "vendor/model-x", apiKey: "test-secret" }]);
	});

	it("keeps an explicit key over the environment", async () => {
		await writeConfig({ providers: [{ name: "groq", apiKey: "file-secret" }] });

		const config = await loadConfig({ GROQ_API_KEY: "test-secret" }, undefined, { configFile });

		expect(config.providers).toEqual([{ name: "groq", apiKey: "file-secret" }]);
	});

	it("finds the file through TICKER_CONFIG", async () => {
		await writeConfig({ port: 4321 });

		const config = await loadConfig({ TICKER_CONFIG: configFile });

		expect(config.port).toBe(4321);
	});

	it("lists every invalid setting", async () => {
		await writeConfig({ fuzzyThreshold: 150 });

		await expect(loadConfig({ CACHE_PROBABILITY: "lots" }, undefined, { configFile })).rejects.toThrow(
			/^Invalid configuration: fuzzyThreshold: .+; cacheProbability: /,
		);
	});

	it("rejects unknown keys", async () => {
		await writeConfig({ colour: "blue" });

		await expect(loadConfig({}, undefined, { configFile })).rejects.toMatchObject({
			kind: "config",
			message: expect.stringContaining("(root): Unrecognized key"),
		});
	});

	it("rejects a file that is not a JSON object", async () => {
		await writeConfig(["not", "an", "object"]);

		await expect(loadConfig({}, undefined, { configFile })).rejects.toThrow(`${configFile} must contain a JSON object`);
	});

	it("rejects a file that does not parse", async () => {
		await writeFile(configFile, "{ nope");

		await expect(loadConfig({}, undefined, { configFile })).rejects.toMatchObject({ kind: "config" });
	});
});

describe("providersFromEnv", () => {
	it("enables You.com from its key", () => {
		expect(providersFromEnv({ YOUCOM_API_KEY: "test-secret" })).toEqual([{ name: "youcom", plugin: "youcom", apiKey: "test-secret" }]);
	});

	it("ignores blank keys", () => {
		expect(providersFromEnv({ OPENROUTER_API_KEY: "  ", GOOGLE_AI_API_KEY: "test-secret" })).toEqual([
			{ name: "gemini", plugin: "gemini", apiKey: "test-secret" },
		]);
	});
});
