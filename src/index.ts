/**
 * snippet-ticker — Public API barrel export.
 *
 * Re-exports every public class, type, and factory function so that
 * consumers can import from a single `"snippet-ticker"` entry point.
 * @module
 */

export { TickerClient } from "./client.js";
export type { CreateTickerClientOptions, MessageRequestOptions, TickerClientOptions, TickerMessage } from "./client.js";
export { MessageCache } from "./message-cache.js";
export type { CacheDocument, MessageCacheOptions } from "./message-cache.js";
export { PluginManager, defaultPluginSettings } from "./plugins/manager.js";
export type { PluginListEntry, PluginManagerOptions } from "./plugins/manager.js";
export { PluginRegistry, isProviderClass, missingProviderMembers } from "./plugins/registry.js";
export type { PluginRegistryOptions } from "./plugins/registry.js";
export { ProviderPlugin, resolveProviderConfig } from "./plugins/plugin.js";
export { listPluginFiles, loadPluginModule, toProviderPlugin } from "./plugins/loader.js";
export * from "./providers/index.js";
export { ratio, findSimilar, isSimilar } from "./similarity.js";
export { loadConfig, providersFromEnv } from "./config.js";
export type { ConfigOverrides, LoadConfigOptions } from "./config.js";
export { PromptManager, DEFAULT_SYSTEM_PROMPT, DEFAULT_USER_PROMPT } from "./prompts.js";
export { createServer, startServer } from "./server.js";
export { TickerError, classifyStatus, describeError, toTickerError } from "./errors.js";
export type { ErrorKind } from "./errors.js";
export { createLogger, getLogLevel, setLogLevel } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
export type {
	AIResponse,
	CacheSettings,
	CachedMessageMeta,
	DiscoveredPlugin,
	ExportedPlugin,
	MessageSource,
	PluginCategory,
	PluginInfo,
	PluginLoadResult,
	PluginMetadata,
	PluginSettings,
	Provider,
	ProviderClass,
	ProviderConfig,
	ProviderDescription,
	ProviderStrategy,
	RegistryExport,
	RegistryValidation,
	ResolvedProviderConfig,
	TickerConfig,
} from "./types.js";

/**
 * Convenience factory: loads configuration and builds a ready client in one call.
 *
 * Reads `ticker.config.json` (if it exists) and the environment before
 * applying any explicit overrides.
 *
 * @example
 * ```ts
 * const ticker = await createTicker({ cacheProbability: 0 });
 * const message = await ticker.getMessage("Be brief.", "Tell me something about AI.");
 * ```
 */
export async function createTicker(
	overrides?: import("./config.js").ConfigOverrides,
): Promise<import("./client.js").TickerClient> {
	const { loadConfig: load } = await import("./config.js");
	const { TickerClient: Client } = await import("./client.js");
	return Client.create(await load(process.env, overrides));
}
