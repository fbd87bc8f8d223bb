/**
 * snippet-ticker — Configuration loading.
 *
 * Settings come from three layers, later ones winning: an optional JSON file
 * (`ticker.config.json`), environment variables, and explicit overrides
 * passed by the embedder. The merged result is validated once by zod and
 * every default is applied here, nowhere else.
 * @module
 */

import { resolve } from "path";
import { z } from "zod";
import { TickerError, describeError } from "./errors.js";
import { readJsonFile } from "./storage.js";
import type { ProviderConfig, TickerConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "ticker.config.json";

/** Built-in providers enabled by the presence of their API key variable, in default priority order. */
const PROVIDER_KEY_ENV: ReadonlyArray<{ name: string; env: string }> = [
	{ name: "openrouter", env: "OPENROUTER_API_KEY" },
	{ name: "together", env: "TOGETHER_API_KEY" },
	{ name: "deepinfra", env: "DEEPINFRA_API_KEY" },
	{ name: "anthropic", env: "ANTHROPIC_API_KEY" },
	{ name: "groq", env: "GROQ_API_KEY" },
	{ name: "gemini", env: "GOOGLE_AI_API_KEY" },
	{ name: "mistral", env: "MISTRAL_API_KEY" },
	{ name: "youcom", env: "YOUCOM_API_KEY" },
];

/** Environment variable → setting key, for scalar settings. */
const SETTING_ENV: ReadonlyArray<[env: string, key: string]> = [
	["FUZZY_THRESHOLD", "fuzzyThreshold"],
	["CACHE_PROBABILITY", "cacheProbability"],
	["MAX_CACHE_SIZE", "maxCacheSize"],
	["LAST_LIMIT", "lastLimit"],
	["CACHE_FILE", "cacheFile"],
	["API_TIMEOUT", "timeout"],
	["PROVIDER_STRATEGY", "strategy"],
	["PLUGIN_DIR", "pluginDirectory"],
	["PLUGIN_SETTINGS_FILE", "pluginSettingsFile"],
	["PROMPTS_FILE", "promptsFile"],
	["PROMPT_PROFILE", "promptProfile"],
	["SYSTEM_PROMPT", "systemPrompt"],
	["USER_PROMPT", "userPrompt"],
	["PORT", "port"],
];

export const ProviderConfigSchema = z.object({
	name: z.string().min(1),
	plugin: z.string().min(1).optional(),
	apiKey: z.string().optional(),
	baseUrl: z.string().url().optional(),
	model: z.string().min(1).optional(),
	maxTokens: z.number().int().positive().optional(),
	temperature: z.number().min(0).max(2).optional(),
	timeout: z.number().positive().optional(),
	extraHeaders: z.record(z.string()).optional(),
	extraParams: z.record(z.unknown()).optional(),
});

const SettingsSchema = z
	.object({
		providers: z.array(ProviderConfigSchema).default([]),
		providerOrder: z.array(z.string().min(1)).default([]),
		strategy: z.enum(["priority", "random"]).default("priority"),
		fuzzyThreshold: z.coerce.number().min(0).max(100).default(85),
		cacheProbability: z.coerce.number().min(0).max(1).default(0.6),
		maxCacheSize: z.coerce.number().int().min(1).default(200),
		lastLimit: z.coerce.number().int().min(1).default(3),
		cacheFile: z.string().min(1).default("message_cache.json"),
		timeout: z.coerce.number().min(1).default(30),
		pluginDirectory: z.string().min(1).optional(),
		pluginSettingsFile: z.string().min(1).optional(),
		promptsFile: z.string().min(1).default("prompts.json"),
		promptProfile: z.string().min(1).default("default"),
		systemPrompt: z.string().min(1).optional(),
		userPrompt: z.string().min(1).optional(),
		port: z.coerce.number().int().min(0).max(65535).default(3000),
	})
	.strict();

/** Explicit settings accepted by {@link loadConfig}; the config file has the same shape. */
export type ConfigOverrides = z.input<typeof SettingsSchema>;

export interface LoadConfigOptions {
	/**
	 * Path of the JSON config file (default: `TICKER_CONFIG`, then
	 * `ticker.config.json`). A missing file is skipped.
	 */
	configFile?: string;
}

type Env = Record<string, string | undefined>;

function envValue(env: Env, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

/** Scalar settings and providers derived from environment variables. */
function settingsFromEnv(env: Env): Record<string, unknown> {
	const settings: Record<string, unknown> = {};
	for (const [envKey, settingKey] of SETTING_ENV) {
		const value = envValue(env, envKey);
		if (value !== undefined) settings[settingKey] = value;
	}

	const order = envValue(env, "PROVIDER_ORDER");
	if (order) {
		settings.providerOrder = order.split(",").map((name) => name.trim()).filter(Boolean);
	}
	return settings;
}

/** Providers whose API key is set in `env`, in built-in priority order. */
export function providersFromEnv(env: Env): ProviderConfig[] {
	const providers: ProviderConfig[] = [];
	for (const { name, env: key } of PROVIDER_KEY_ENV) {
		const apiKey = envValue(env, key);
		if (apiKey) providers.push({ name, plugin: name, apiKey });
	}
	return providers;
}

async function readConfigFile(path: string, required: boolean): Promise<Record<string, unknown>> {
	let raw: unknown;
	try {
		raw = await readJsonFile(path);
	} catch (error: unknown) {
		throw new TickerError({ kind: "config", message: `Cannot read ${path}: ${describeError(error)}`, cause: error });
	}

	if (raw === undefined) {
		if (required) {
			throw new TickerError({ kind: "config", message: `Config file not found: ${path}` });
		}
		return {};
	}
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new TickerError({ kind: "config", message: `${path} must contain a JSON object` });
	}
	return { ...raw };
}

/**
 * Combine explicit provider entries with key-derived ones.
 * An explicit entry wins over the derived one of the same name but borrows
 * its API key when it has none.
 */
function mergeProviders(explicit: ProviderConfig[], fromEnv: ProviderConfig[]): ProviderConfig[] {
	const merged = explicit.map((entry) => {
		const derived = fromEnv.find((p) => p.name === entry.name);
		return entry.apiKey || !derived ? entry : { ...entry, apiKey: derived.apiKey };
	});
	for (const derived of fromEnv) {
		if (!merged.some((entry) => entry.name === derived.name)) merged.push(derived);
	}
	return merged;
}

/** Stable sort: names listed in `order` first, in that order; the rest keep their place after them. */
function applyOrder(providers: ProviderConfig[], order: string[]): ProviderConfig[] {
	const rank = (name: string): number => {
		const index = order.indexOf(name);
		return index === -1 ? order.length : index;
	};
	return [...providers].sort((a, b) => rank(a.name) - rank(b.name));
}

/**
 * Build the application configuration.
 *
 * @throws {TickerError} `config` listing every invalid setting.
 */
export async function loadConfig(
	env: Env = process.env,
	overrides?: ConfigOverrides,
	options?: LoadConfigOptions,
): Promise<TickerConfig> {
	const explicitFile = options?.configFile ?? envValue(env, "TICKER_CONFIG");
	const fileSettings = await readConfigFile(resolve(explicitFile ?? DEFAULT_CONFIG_FILE), explicitFile !== undefined);

	const parsed = SettingsSchema.safeParse({ ...fileSettings, ...settingsFromEnv(env), ...overrides });
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
		throw new TickerError({ kind: "config", message: `Invalid configuration: ${issues.join("; ")}` });
	}

	const settings = parsed.data;
	const providers = applyOrder(mergeProviders(settings.providers, providersFromEnv(env)), settings.providerOrder);

	return {
		providers,
		strategy: settings.strategy,
		fuzzyThreshold: settings.fuzzyThreshold,
		cacheProbability: settings.cacheProbability,
		cache: {
			file: settings.cacheFile,
			maxSize: settings.maxCacheSize,
			lastLimit: settings.lastLimit,
		},
		timeout: settings.timeout,
		pluginDirectory: settings.pluginDirectory,
		pluginSettingsFile: settings.pluginSettingsFile,
		promptsFile: settings.promptsFile,
		promptProfile: settings.promptProfile,
		systemPrompt: settings.systemPrompt,
		userPrompt: settings.userPrompt,
		port: settings.port,
	};
}
