/**
 * snippet-ticker — Plugin wrapper.
 *
 * Pairs a provider class with its descriptive metadata and builds fresh,
 * uninitialized provider instances from configuration.
 * @module
 */

import type {
	PluginInfo,
	PluginMetadata,
	Provider,
	ProviderClass,
	ProviderConfig,
	ResolvedProviderConfig,
} from "../types.js";

export const DEFAULT_MAX_TOKENS = 512;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * Apply defaults to a raw {@link ProviderConfig}.
 *
 * Explicit values win, then the plugin's `defaults`, then the global
 * constants. `plugin` falls back to the lower-cased provider name.
 */
export function resolveProviderConfig(
	config: ProviderConfig,
	defaults?: PluginMetadata["defaults"],
): ResolvedProviderConfig {
	return {
		name: config.name,
		plugin: config.plugin ?? config.name.toLowerCase(),
		apiKey: config.apiKey || undefined,
		baseUrl: config.baseUrl || defaults?.baseUrl || "",
		model: config.model || defaults?.model || "",
		maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
		temperature: config.temperature ?? DEFAULT_TEMPERATURE,
		timeout: config.timeout ?? DEFAULT_TIMEOUT_SECONDS,
		extraHeaders: { ...config.extraHeaders },
		extraParams: { ...config.extraParams },
	};
}

/**
 * A provider implementation plus the metadata that makes it a unit of
 * discovery and registration.
 */
export class ProviderPlugin {
	readonly providerClass: ProviderClass;
	readonly metadata: PluginMetadata;

	constructor(providerClass: ProviderClass, metadata: PluginMetadata) {
		this.providerClass = providerClass;
		this.metadata = metadata;
	}

	get version(): string {
		return this.metadata.version;
	}

	get author(): string {
		return this.metadata.author;
	}

	get description(): string {
		return this.metadata.description;
	}

	get requires(): string[] {
		return this.metadata.requires;
	}

	/**
	 * Construct a provider bound to `config`.
	 * Does not call `initialize()`; validation can run in between.
	 */
	createProvider(config: ProviderConfig): Provider {
		return new this.providerClass(resolveProviderConfig(config, this.metadata.defaults));
	}

	getPluginInfo(): PluginInfo {
		return {
			providerClass: this.providerClass.name,
			version: this.version,
			author: this.author,
			description: this.description,
			requires: [...this.requires],
			metadata: structuredClone(this.metadata),
		};
	}
}
