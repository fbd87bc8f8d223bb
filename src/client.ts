/**
 * snippet-ticker — TickerClient: the façade the web layer and CLI talk to.
 *
 * Owns the {@link PluginManager} and the {@link MessageCache}. Each message
 * request may first be served from cache (with probability
 * `cacheProbability`), otherwise walks the active providers in priority (or
 * shuffled) order until one returns text that is not a fuzzy duplicate.
 * Every provider gets exactly one attempt per request.
 * @module
 */

import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { MessageCache } from "./message-cache.js";
import { PluginManager } from "./plugins/manager.js";
import { findSimilar } from "./similarity.js";
import type { MessageSource, Provider, ProviderConfig, ProviderDescription, TickerConfig } from "./types.js";

/** A message together with where it came from. */
export interface TickerMessage {
	message: string;
	source: MessageSource;
	/** Config name of the provider that generated it, for `source: "provider"`. */
	provider?: string;
}

export interface TickerClientOptions {
	/** Uniform random source in [0, 1) for the cache roll and random strategy. */
	random?: () => number;
}

export interface MessageRequestOptions {
	/**
	 * Also reject provider text that is a fuzzy duplicate of any cached
	 * message, not only of the recently served ones. The cache step is
	 * unaffected.
	 */
	checkWholeCache?: boolean;
}

export interface CreateTickerClientOptions extends TickerClientOptions {
	manager?: PluginManager;
	cache?: MessageCache;
}

/** One active provider and its lazy initialization state. */
interface ProviderSlot {
	name: string;
	provider: Provider;
	ready?: Promise<boolean>;
	/** Set once initialization failed; the slot is skipped for the rest of the session. */
	excluded: boolean;
}

export class TickerClient {
	readonly config: TickerConfig;
	private readonly manager: PluginManager;
	private readonly cache: MessageCache;
	private readonly random: () => number;
	private slots: readonly ProviderSlot[] = [];
	/** Providers added at runtime; rebuilt alongside configured ones on reload. */
	private customConfigs: ProviderConfig[] = [];
	private readonly log = createLogger("client");

	constructor(config: TickerConfig, manager: PluginManager, cache: MessageCache, options?: TickerClientOptions) {
		this.config = config;
		this.manager = manager;
		this.cache = cache;
		this.random = options?.random ?? Math.random;
	}

	/**
	 * Build a ready client from configuration: plugin manager (with its
	 * settings and custom plugin directory), message cache, providers.
	 */
	static async create(config: TickerConfig, options?: CreateTickerClientOptions): Promise<TickerClient> {
		const manager = options?.manager ?? await PluginManager.create({
			pluginDirectory: config.pluginDirectory,
			settingsFile: config.pluginSettingsFile,
		});
		await manager.loadAllPlugins();

		const cache = options?.cache ?? await MessageCache.open(config.cache, { random: options?.random });
		const client = new TickerClient(config, manager, cache, options);
		await client.reloadProviders();
		return client;
	}

	// ---------------------------------------------------------------------------
	// Messages
	// ---------------------------------------------------------------------------

	/**
	 * Return a message that is neither on the recent list nor a fuzzy
	 * duplicate of `existingMessages`, or `undefined` when every provider
	 * failed or only produced duplicates.
	 *
	 * @param fuzzyThreshold - Similarity (0–100) at or above which a candidate
	 *                         is rejected (default: the configured threshold).
	 */
	async getMessage(
		systemPrompt: string,
		userPrompt: string,
		existingMessages: readonly string[] = [],
		fuzzyThreshold = this.config.fuzzyThreshold,
	): Promise<string | undefined> {
		return (await this.requestMessage(systemPrompt, userPrompt, existingMessages, fuzzyThreshold))?.message;
	}

	/** {@link getMessage}, also reporting where the message came from. */
	async requestMessage(
		systemPrompt: string,
		userPrompt: string,
		existingMessages: readonly string[] = [],
		fuzzyThreshold = this.config.fuzzyThreshold,
		options?: MessageRequestOptions,
	): Promise<TickerMessage | undefined> {
		const cached = await this.tryCache(existingMessages, fuzzyThreshold);
		if (cached !== undefined) {
			return { message: cached, source: "cache" };
		}

		const known = options?.checkWholeCache ? this.cache.messages() : this.cache.recent();
		const comparison = [...existingMessages, ...known];
		for (const slot of this.ordered(this.slots)) {
			if (!(await this.ensureReady(slot))) continue;

			let content: string | undefined;
			try {
				content = (await slot.provider.generateMessage(systemPrompt, userPrompt))?.content.trim();
			} catch (error: unknown) {
				this.log.error(`Provider ${slot.name} threw: ${describeError(error)}`);
				continue;
			}
			if (!content) {
				this.log.warn(`Provider ${slot.name} returned nothing, trying next`);
				continue;
			}

			const duplicate = findSimilar(content, comparison, fuzzyThreshold);
			if (duplicate !== undefined) {
				this.log.warn(`Provider ${slot.name} returned a duplicate of "${duplicate.slice(0, 40)}", trying next`);
				continue;
			}

			await this.cache.add(content);
			this.log.info(`Message served by ${slot.name}`);
			return { message: content, source: "provider", provider: slot.name };
		}

		this.log.error("No provider produced an acceptable message");
		return undefined;
	}

	/**
	 * Any cached message, for when {@link requestMessage} came back empty.
	 * Prefers messages outside the recent list.
	 */
	async archiveMessage(): Promise<TickerMessage | undefined> {
		const message = await this.cache.archiveFallback();
		return message === undefined ? undefined : { message, source: "archive" };
	}

	// ---------------------------------------------------------------------------
	// Providers
	// ---------------------------------------------------------------------------

	/**
	 * Health-check every active provider concurrently. A check that throws, or a
	 * provider that cannot be initialized, reports false.
	 */
	async healthCheckAll(): Promise<Record<string, boolean>> {
		const slots = this.slots;
		const results = await Promise.all(
			slots.map(async (slot): Promise<[string, boolean]> => {
				try {
					const healthy = (await this.ensureReady(slot)) && (await slot.provider.healthCheck());
					return [slot.name, healthy];
				} catch (error: unknown) {
					this.log.error(`Health check failed for ${slot.name}: ${describeError(error)}`);
					return [slot.name, false];
				}
			}),
		);
		return Object.fromEntries(results);
	}

	/** Names of providers not yet excluded, in priority order. */
	getAvailableProviders(): string[] {
		return this.slots.filter((slot) => !slot.excluded).map((slot) => slot.name);
	}

	getProviderInfo(): Record<string, ProviderDescription | { error: string }> {
		const info: Record<string, ProviderDescription | { error: string }> = {};
		for (const slot of this.slots) {
			try {
				info[slot.name] = slot.provider.getInfo();
			} catch (error: unknown) {
				this.log.error(`Failed to get info for provider ${slot.name}: ${describeError(error)}`);
				info[slot.name] = { error: describeError(error) };
			}
		}
		return info;
	}

	/**
	 * Build a provider from plugin `pluginName`, initialize it and append it
	 * to the active set. Resolves false (and adds nothing) on any failure.
	 */
	async addCustomProvider(pluginName: string, config: ProviderConfig): Promise<boolean> {
		if (this.slots.some((slot) => slot.name === config.name)) {
			this.log.error(`A provider named ${config.name} is already active`);
			return false;
		}

		const providerConfig = { ...config, plugin: pluginName };
		const slot = await this.buildSlot(providerConfig);
		if (!slot || !(await this.ensureReady(slot))) {
			this.log.error(`Failed to add custom provider ${config.name}`);
			return false;
		}

		this.customConfigs = [...this.customConfigs, providerConfig];
		this.slots = [...this.slots, slot];
		this.log.info(`Added custom provider: ${config.name}`);
		return true;
	}

	/**
	 * Rebuild every provider from configuration (plus custom additions) and
	 * swap the new set in at once. Calls already in flight keep the set they
	 * started with.
	 *
	 * @returns Names of the new active providers.
	 */
	async reloadProviders(): Promise<string[]> {
		const slots: ProviderSlot[] = [];
		for (const entry of [...this.config.providers, ...this.customConfigs]) {
			if (slots.some((slot) => slot.name === entry.name)) {
				this.log.warn(`Ignoring duplicate provider entry: ${entry.name}`);
				continue;
			}
			const slot = await this.buildSlot(entry);
			if (slot) slots.push(slot);
		}

		this.slots = slots;
		const names = slots.map((slot) => slot.name);
		this.log.info(`Active providers: ${names.length > 0 ? names.join(", ") : "(none)"}`);
		return names;
	}

	getManager(): PluginManager {
		return this.manager;
	}

	getCache(): MessageCache {
		return this.cache;
	}

	/** Wait for pending cache writes. */
	async close(): Promise<void> {
		await this.cache.flush();
	}

	// ---------------------------------------------------------------------------
	// Internal
	// ---------------------------------------------------------------------------

	private async tryCache(existing: readonly string[], threshold: number): Promise<string | undefined> {
		if (this.cache.size === 0 || this.random() >= this.config.cacheProbability) {
			return undefined;
		}
		const candidate = this.cache.pickCandidate(existing, threshold);
		if (candidate === undefined) {
			this.log.debug("No acceptable cached message, asking providers");
			return undefined;
		}
		await this.cache.markServed(candidate);
		this.log.info("Message served from cache");
		return candidate;
	}

	private async buildSlot(entry: ProviderConfig): Promise<ProviderSlot | undefined> {
		const pluginName = entry.plugin ?? entry.name.toLowerCase();
		if (!this.manager.isEnabled(pluginName)) {
			this.log.info(`Skipping provider ${entry.name}: plugin ${pluginName} is disabled`);
			return undefined;
		}

		const provider = await this.manager.loadPlugin(pluginName, {
			...entry,
			timeout: entry.timeout ?? this.config.timeout,
		});
		if (!provider) {
			this.log.error(`Could not create provider ${entry.name} from plugin ${pluginName}`);
			return undefined;
		}
		return { name: entry.name, provider, excluded: false };
	}

	/** Initialize `slot` once; concurrent callers share the same attempt. */
	private async ensureReady(slot: ProviderSlot): Promise<boolean> {
		if (slot.excluded) return false;
		slot.ready ??= this.initializeSlot(slot);
		return slot.ready;
	}

	private async initializeSlot(slot: ProviderSlot): Promise<boolean> {
		let ok: boolean;
		try {
			ok = await slot.provider.initialize();
		} catch (error: unknown) {
			this.log.error(`Provider ${slot.name} failed to initialize: ${describeError(error)}`);
			ok = false;
		}
		if (!ok) {
			slot.excluded = true;
			this.log.warn(`Provider ${slot.name} excluded for this session`);
		}
		return ok;
	}

	private ordered(slots: readonly ProviderSlot[]): ProviderSlot[] {
		const copy = [...slots];
		if (this.config.strategy === "random") {
			for (let i = copy.length - 1; i > 0; i--) {
				const j = Math.floor(this.random() * (i + 1));
				[copy[i], copy[j]] = [copy[j], copy[i]];
			}
		}
		return copy;
	}
}
