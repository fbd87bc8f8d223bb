/**
 * snippet-ticker — Core type definitions.
 *
 * Provider-agnostic shapes shared by the plugin registry, the plugin
 * manager, the message cache and the client façade. Concrete providers map
 * their upstream API responses into {@link AIResponse}.
 * @module
 */

/** Where a plugin came from. */
export type PluginCategory = "builtin" | "custom" | "community";

/** Order in which the client walks its active providers. */
export type ProviderStrategy = "priority" | "random";

/**
 * Connection settings for a single provider, as supplied by configuration.
 *
 * Only `name` is required here; everything else is defaulted once by
 * {@link resolveProviderConfig} before a provider is constructed.
 */
export interface ProviderConfig {
	/** Display name, also the key under which the client tracks the provider. */
	name: string;
	/** Registered plugin to build this provider from (default: `name` lower-cased). */
	plugin?: string;
	/** Secret API key. May be absent only for providers that allow anonymous access. */
	apiKey?: string;
	/** API base URL, e.g. `"https://openrouter.ai/api/v1"`. */
	baseUrl?: string;
	/** Model identifier sent upstream. */
	model?: string;
	/** Completion token cap (positive integer). */
	maxTokens?: number;
	/** Sampling temperature, typically 0–2. */
	temperature?: number;
	/** Request timeout in seconds. */
	timeout?: number;
	/** Extra HTTP headers merged into every request. */
	extraHeaders?: Record<string, string>;
	/** Extra body fields merged into every completion request. */
	extraParams?: Record<string, unknown>;
}

/** A {@link ProviderConfig} with every default applied. */
export interface ResolvedProviderConfig {
	name: string;
	plugin: string;
	apiKey?: string;
	baseUrl: string;
	model: string;
	maxTokens: number;
	temperature: number;
	timeout: number;
	extraHeaders: Record<string, string>;
	extraParams: Record<string, unknown>;
}

/** Normalized result of one successful generation call. */
export interface AIResponse {
	/** Generated text, trimmed and non-empty. */
	readonly content: string;
	/** Name of the provider that produced it. */
	readonly providerName: string;
	/** Model that produced it. */
	readonly model: string;
	/** Token accounting (`promptTokens`, `completionTokens`, `totalTokens`). */
	readonly usage: Readonly<Record<string, number>>;
	/** Free-form details: response id, finish reason, timestamps. */
	readonly metadata: Readonly<Record<string, unknown>>;
}

/** Static description returned by {@link Provider.getInfo}. */
export interface ProviderDescription {
	name: string;
	configName: string;
	model: string;
	supportedModels: readonly string[];
	baseUrl: string;
	timeout: number;
	maxTokens: number;
}

/**
 * Contract that every provider backend must implement.
 *
 * Expected failures (bad config, timeouts, 4xx/5xx, malformed bodies) are
 * reported as `false` / `undefined`, never thrown, so the client can fail
 * over with a simple check.
 */
export interface Provider {
	/** Human-readable provider name (e.g. "OpenRouter"). */
	readonly providerName: string;
	/** Models this backend is known to serve. */
	readonly supportedModels: readonly string[];
	/** The configuration this instance was built with. */
	readonly config: ResolvedProviderConfig;
	/** Set up auth/connection state. Returns false (and logs) on failure. */
	initialize(): Promise<boolean>;
	/**
	 * Issue one completion request.
	 * Resolves `undefined` on any transport or API failure; throws only when
	 * called before a successful {@link initialize}.
	 */
	generateMessage(systemPrompt: string, userPrompt: string): Promise<AIResponse | undefined>;
	/** Lightweight liveness check; never mutates generation state. */
	healthCheck(): Promise<boolean>;
	/** Structural pre-flight check, run before {@link initialize}. */
	validateConfig(): boolean;
	/** Descriptive snapshot for status pages. */
	getInfo(): ProviderDescription;
}

/** Constructor shape every provider class must have. */
export type ProviderClass = new (config: ResolvedProviderConfig) => Provider;

/** Descriptive metadata attached to a plugin. */
export interface PluginMetadata {
	name: string;
	version: string;
	author: string;
	description: string;
	/** Names of other plugins this one depends on. */
	requires: string[];
	category: PluginCategory;
	apiVersion: string;
	supportedFeatures: string[];
	/** Connection defaults used when a config omits `baseUrl` / `model`. */
	defaults?: {
		baseUrl?: string;
		model?: string;
	};
}

/** Read-only snapshot returned by `ProviderPlugin.getPluginInfo()`. */
export interface PluginInfo {
	providerClass: string;
	version: string;
	author: string;
	description: string;
	requires: string[];
	metadata: PluginMetadata;
}

/** One entry of `PluginRegistry.exportRegistry()`. */
export interface ExportedPlugin {
	providerClassName: string;
	version: string;
	author: string;
	description: string;
	requires: string[];
	metadata: PluginMetadata;
}

/** Serializable registry snapshot. */
export interface RegistryExport {
	version: string;
	plugins: Record<string, ExportedPlugin>;
}

/** Outcome of validating every registry entry. */
export interface RegistryValidation {
	valid: string[];
	invalid: string[];
}

/** A plugin candidate found during discovery. */
export interface DiscoveredPlugin {
	name: string;
	source: "builtin" | "file";
	/** Absolute module path for file-based plugins. */
	path?: string;
	metadata: PluginMetadata;
	/** False when the plugin is on the disabled list. */
	enabled: boolean;
}

/** Per-plugin outcome of `PluginManager.loadAllPlugins()`. */
export type PluginLoadResult = { ok: true } | { ok: false; error: string };

/** Persisted plugin-manager settings. */
export interface PluginSettings {
	enabledPlugins: string[];
	disabledPlugins: string[];
	/** Per-plugin config overrides applied when a provider is created. */
	pluginSettings: Record<string, Partial<Omit<ProviderConfig, "name" | "plugin">>>;
	autoDiscovery: boolean;
	validateOnLoad: boolean;
}

/** Message-cache tuning. */
export interface CacheSettings {
	/** Path of the JSON document backing the cache. */
	file: string;
	maxSize: number;
	lastLimit: number;
}

/** Metadata stored next to each cached message. */
export interface CachedMessageMeta {
	/** Unix timestamp (ms) when the message was first accepted. */
	firstSeen: number;
	/** Unix timestamp (ms) when it was last served, if ever. */
	lastServed?: number;
}

/** Where a served message came from. */
export type MessageSource = "provider" | "cache" | "archive";

/** Fully-resolved application configuration. */
export interface TickerConfig {
	/** Active providers in priority order. */
	providers: ProviderConfig[];
	strategy: ProviderStrategy;
	fuzzyThreshold: number;
	cacheProbability: number;
	cache: CacheSettings;
	/** Default request timeout in seconds. */
	timeout: number;
	pluginDirectory?: string;
	pluginSettingsFile?: string;
	promptsFile: string;
	promptProfile: string;
	/** Explicit prompt overrides; win over the prompts file. */
	systemPrompt?: string;
	userPrompt?: string;
	port: number;
}
