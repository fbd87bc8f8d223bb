/**
 * snippet-ticker — PluginManager: plugin lifecycle on top of the registry.
 *
 * Discovers plugins (built-in set plus an optional directory of custom
 * modules), loads, unloads and reloads them, applies the enabled/disabled
 * lists, and keeps those lists in an optional JSON settings file.
 * @module
 */

import { z } from "zod";
import { TickerError, describeError, toTickerError } from "../errors.js";
import { createLogger } from "../logger.js";
import { getBuiltinPlugins } from "../providers/index.js";
import { SerialQueue, readJsonFile, writeJsonAtomic } from "../storage.js";
import type {
	DiscoveredPlugin,
	PluginInfo,
	PluginLoadResult,
	PluginSettings,
	Provider,
	ProviderConfig,
} from "../types.js";
import { listPluginFiles, loadPluginModule } from "./loader.js";
import type { ProviderPlugin } from "./plugin.js";
import { PluginRegistry } from "./registry.js";

const ConfigOverridesSchema = z.object({
	apiKey: z.string().optional(),
	baseUrl: z.string().optional(),
	model: z.string().optional(),
	maxTokens: z.number().int().positive().optional(),
	temperature: z.number().min(0).max(2).optional(),
	timeout: z.number().positive().optional(),
	extraHeaders: z.record(z.string()).optional(),
	extraParams: z.record(z.unknown()).optional(),
});

const PluginSettingsSchema = z.object({
	enabledPlugins: z.array(z.string()).default([]),
	disabledPlugins: z.array(z.string()).default([]),
	pluginSettings: z.record(ConfigOverridesSchema).default({}),
	autoDiscovery: z.boolean().default(true),
	validateOnLoad: z.boolean().default(true),
});

export function defaultPluginSettings(): PluginSettings {
	return {
		enabledPlugins: [],
		disabledPlugins: [],
		pluginSettings: {},
		autoDiscovery: true,
		validateOnLoad: true,
	};
}

type Candidate =
	| { source: "builtin"; plugin: ProviderPlugin }
	| { source: "file"; path: string; plugin: ProviderPlugin };

export interface PluginManagerOptions {
	/** Registry to manage (default: a fresh one). */
	registry?: PluginRegistry;
	/** Built-in plugins by name (default: {@link getBuiltinPlugins}). */
	builtins?: Record<string, ProviderPlugin>;
	/** Directory scanned for custom plugin modules. */
	pluginDirectory?: string;
	/** JSON file holding {@link PluginSettings}; settings stay in memory without it. */
	settingsFile?: string;
	/** Initial settings, used when no settings file exists yet. */
	settings?: Partial<PluginSettings>;
}

/** One row of {@link PluginManager.getPluginList}. */
export interface PluginListEntry {
	name: string;
	pluginInfo: PluginInfo;
	providerClass: string;
	enabled: boolean;
}

export class PluginManager {
	private readonly registry: PluginRegistry;
	private readonly builtins: Record<string, ProviderPlugin>;
	private readonly pluginDirectory?: string;
	private readonly settingsFile?: string;
	private settings: PluginSettings;
	private candidates: Map<string, Candidate> = new Map();
	private readonly writes = new SerialQueue();
	private readonly log = createLogger("plugins");

	constructor(options?: PluginManagerOptions) {
		this.registry = options?.registry ?? new PluginRegistry();
		this.builtins = options?.builtins ?? getBuiltinPlugins();
		this.pluginDirectory = options?.pluginDirectory;
		this.settingsFile = options?.settingsFile;
		this.settings = { ...defaultPluginSettings(), ...options?.settings };
	}

	/** Construct a manager and read its settings file, if any. */
	static async create(options?: PluginManagerOptions): Promise<PluginManager> {
		const manager = new PluginManager(options);
		await manager.loadSettings();
		return manager;
	}

	// ---------------------------------------------------------------------------
	// Settings
	// ---------------------------------------------------------------------------

	/**
	 * Read the settings file. A missing file keeps the current settings; an
	 * unreadable or invalid one is logged and also keeps them.
	 */
	async loadSettings(): Promise<PluginSettings> {
		if (!this.settingsFile) return this.getSettings();

		try {
			const raw = await readJsonFile(this.settingsFile);
			if (raw === undefined) return this.getSettings();

			const parsed = PluginSettingsSchema.safeParse(raw);
			if (parsed.success) {
				this.settings = parsed.data;
			} else {
				this.log.error(`Invalid plugin settings in ${this.settingsFile}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
			}
		} catch (error: unknown) {
			this.log.error(`Failed to load plugin settings: ${describeError(error)}`);
		}
		return this.getSettings();
	}

	getSettings(): PluginSettings {
		return structuredClone(this.settings);
	}

	isEnabled(name: string): boolean {
		return !this.settings.disabledPlugins.includes(name);
	}

	/** Put `name` on the enabled list and take it off the disabled list. Does not load it. */
	async enablePlugin(name: string): Promise<void> {
		const { enabledPlugins, disabledPlugins } = this.settings;
		this.settings = {
			...this.settings,
			enabledPlugins: enabledPlugins.includes(name) ? enabledPlugins : [...enabledPlugins, name],
			disabledPlugins: disabledPlugins.filter((p) => p !== name),
		};
		await this.saveSettings();
	}

	/** Put `name` on the disabled list, take it off the enabled list, and unload it if loaded. */
	async disablePlugin(name: string): Promise<void> {
		const { enabledPlugins, disabledPlugins } = this.settings;
		this.settings = {
			...this.settings,
			enabledPlugins: enabledPlugins.filter((p) => p !== name),
			disabledPlugins: disabledPlugins.includes(name) ? disabledPlugins : [...disabledPlugins, name],
		};
		if (this.registry.isRegistered(name)) {
			this.unloadPlugin(name);
		}
		await this.saveSettings();
	}

	// ---------------------------------------------------------------------------
	// Discovery
	// ---------------------------------------------------------------------------

	/**
	 * Scan the built-in set and the custom plugin directory.
	 *
	 * A custom module that fails to import or exports no valid plugin is
	 * logged and skipped; the rest are still discovered.
	 */
	async discoverPlugins(): Promise<DiscoveredPlugin[]> {
		const candidates = new Map<string, Candidate>();
		for (const [name, plugin] of Object.entries(this.builtins)) {
			candidates.set(name, { source: "builtin", plugin });
		}

		if (this.settings.autoDiscovery && this.pluginDirectory) {
			for (const file of await this.listDirectory(this.pluginDirectory)) {
				if (candidates.has(file.name)) {
					this.log.warn(`Skipping ${file.path}: a plugin named ${file.name} already exists`);
					continue;
				}
				try {
					const plugin = await loadPluginModule(file.path);
					candidates.set(file.name, { source: "file", path: file.path, plugin });
				} catch (error: unknown) {
					this.log.error(`Failed to discover plugin ${file.name}: ${describeError(error)}`);
				}
			}
		}

		this.candidates = candidates;
		const discovered = Array.from(candidates, ([name, candidate]) => ({
			name,
			source: candidate.source,
			...(candidate.source === "file" ? { path: candidate.path } : {}),
			metadata: structuredClone(candidate.plugin.metadata),
			enabled: this.isEnabled(name),
		}));
		this.log.info(`Discovered ${discovered.length} plugins`);
		return discovered;
	}

	// ---------------------------------------------------------------------------
	// Loading
	// ---------------------------------------------------------------------------

	/**
	 * Register `name` if needed and return a provider built from it.
	 *
	 * The provider is constructed but not initialized. Resolves `undefined`
	 * for disabled, unknown or invalid plugins.
	 *
	 * @param config - Provider configuration (default: just the plugin name,
	 *                 so plugin defaults and settings overrides apply).
	 */
	async loadPlugin(name: string, config?: ProviderConfig): Promise<Provider | undefined> {
		try {
			await this.ensureRegistered(name);
		} catch (error: unknown) {
			this.log.error(`Failed to load plugin ${name}: ${describeError(error)}`);
			return undefined;
		}
		return this.createProvider(name, config ?? { name, plugin: name });
	}

	/**
	 * Discover and register every enabled plugin, plus anything on the
	 * enabled list. One failure never stops the rest.
	 */
	async loadAllPlugins(): Promise<Record<string, PluginLoadResult>> {
		await this.discoverPlugins();

		const names = new Set<string>([...this.candidates.keys(), ...this.settings.enabledPlugins]);
		const results: Record<string, PluginLoadResult> = {};
		for (const name of names) {
			if (!this.isEnabled(name)) {
				this.log.info(`Skipping disabled plugin: ${name}`);
				continue;
			}
			try {
				await this.ensureRegistered(name);
				results[name] = { ok: true };
			} catch (error: unknown) {
				const message = describeError(error);
				this.log.error(`Failed to load plugin ${name}: ${message}`);
				results[name] = { ok: false, error: message };
			}
		}

		const loaded = Object.values(results).filter((r) => r.ok).length;
		this.log.info(`Loaded ${loaded} of ${Object.keys(results).length} plugins`);
		return results;
	}

	/**
	 * Load and register every plugin module in `directory`
	 * (default: the configured plugin directory).
	 *
	 * @returns Names newly registered.
	 */
	async loadPluginsFromDirectory(directory = this.pluginDirectory): Promise<string[]> {
		if (!directory) return [];

		const loaded: string[] = [];
		for (const file of await this.listDirectory(directory)) {
			if (Object.hasOwn(this.builtins, file.name)) {
				this.log.warn(`Skipping ${file.path}: ${file.name} is a built-in plugin`);
				continue;
			}
			if (!this.isEnabled(file.name)) {
				this.log.info(`Skipping disabled plugin: ${file.name}`);
				continue;
			}
			try {
				const plugin = await loadPluginModule(file.path);
				this.assertValid(file.name, plugin);
				if (this.registry.registerPlugin(file.name, plugin)) {
					this.candidates.set(file.name, { source: "file", path: file.path, plugin });
					loaded.push(file.name);
				}
			} catch (error: unknown) {
				this.log.error(`Failed to load plugin from ${file.path}: ${describeError(error)}`);
			}
		}

		this.log.info(`Loaded ${loaded.length} plugins from ${directory}${loaded.length > 0 ? `: ${loaded.join(", ")}` : ""}`);
		return loaded;
	}

	unloadPlugin(name: string): boolean {
		const removed = this.registry.unregisterPlugin(name);
		if (removed) {
			this.log.info(`Unloaded plugin: ${name}`);
		}
		return removed;
	}

	/**
	 * Load `name` again from its source and swap it in.
	 *
	 * The new plugin is fully loaded and validated before the registry is
	 * touched, so a failed reload leaves the previous plugin registered.
	 * A disabled plugin is never reloaded.
	 */
	async reloadPlugin(name: string): Promise<ProviderPlugin | undefined> {
		if (!this.isEnabled(name)) {
			this.log.warn(`Not reloading disabled plugin: ${name}`);
			return undefined;
		}
		this.log.info(`Reloading plugin: ${name}`);

		let plugin: ProviderPlugin;
		try {
			plugin = await this.resolvePlugin(name, { fresh: true });
			this.assertValid(name, plugin);
		} catch (error: unknown) {
			this.log.error(`Reload of ${name} failed, keeping the current version: ${describeError(error)}`);
			return undefined;
		}

		if (!this.registry.replacePlugin(name, plugin)) {
			this.registry.registerPlugin(name, plugin);
		}
		return plugin;
	}

	/**
	 * Build a provider from the registered plugin `name`.
	 * Per-plugin overrides from the settings file are applied over `config`.
	 */
	createProvider(name: string, config: ProviderConfig): Provider | undefined {
		const plugin = this.registry.getPlugin(name);
		if (!plugin) {
			this.log.error(`Plugin ${name} not found`);
			return undefined;
		}

		const overrides = this.settings.pluginSettings[name] ?? {};
		try {
			return plugin.createProvider({ ...config, ...overrides, plugin: name });
		} catch (error: unknown) {
			this.log.error(`Failed to create provider from plugin ${name}: ${describeError(error)}`);
			return undefined;
		}
	}

	// ---------------------------------------------------------------------------
	// Accessors
	// ---------------------------------------------------------------------------

	getPluginList(): PluginListEntry[] {
		return Array.from(this.registry.getAllPlugins(), ([name, plugin]) => ({
			name,
			pluginInfo: plugin.getPluginInfo(),
			providerClass: plugin.providerClass.name,
			enabled: this.isEnabled(name),
		}));
	}

	getRegistry(): PluginRegistry {
		return this.registry;
	}

	// ---------------------------------------------------------------------------
	// Internal
	// ---------------------------------------------------------------------------

	/** Make sure `name` is registered, loading it from its source if needed. */
	private async ensureRegistered(name: string): Promise<ProviderPlugin> {
		if (!this.isEnabled(name)) {
			throw new TickerError({ kind: "plugin_load", message: `Plugin ${name} is disabled` });
		}

		const existing = this.registry.getPlugin(name);
		if (existing) return existing;

		const plugin = await this.resolvePlugin(name);
		this.assertValid(name, plugin);
		this.registry.registerPlugin(name, plugin);
		return plugin;
	}

	/** Find the plugin named `name` among candidates, built-ins, then the plugin directory. */
	private async resolvePlugin(name: string, options?: { fresh?: boolean }): Promise<ProviderPlugin> {
		const candidate = this.candidates.get(name);
		if (candidate?.source === "file") {
			const plugin = options?.fresh ? await loadPluginModule(candidate.path, options) : candidate.plugin;
			this.candidates.set(name, { ...candidate, plugin });
			return plugin;
		}
		if (candidate) return candidate.plugin;

		if (Object.hasOwn(this.builtins, name)) {
			return this.builtins[name];
		}

		if (this.pluginDirectory) {
			const file = (await this.listDirectory(this.pluginDirectory)).find((f) => f.name === name);
			if (file) {
				const plugin = await loadPluginModule(file.path, options);
				this.candidates.set(name, { source: "file", path: file.path, plugin });
				return plugin;
			}
		}

		throw new TickerError({ kind: "plugin_load", message: `Plugin ${name} not found` });
	}

	private assertValid(name: string, plugin: ProviderPlugin): void {
		if (this.settings.validateOnLoad && !this.registry.validatePlugin(plugin)) {
			throw new TickerError({ kind: "plugin_load", message: `Plugin ${name} failed validation` });
		}
	}

	private async listDirectory(directory: string): Promise<Array<{ name: string; path: string }>> {
		try {
			return await listPluginFiles(directory);
		} catch (error: unknown) {
			this.log.warn(`Cannot read plugin directory ${directory}: ${describeError(error)}`);
			return [];
		}
	}

	private async saveSettings(): Promise<void> {
		const file = this.settingsFile;
		if (!file) return;

		const snapshot = this.getSettings();
		try {
			await this.writes.run(() => writeJsonAtomic(file, snapshot));
		} catch (error: unknown) {
			this.log.error(`Failed to save plugin settings: ${toTickerError(error).message}`);
		}
	}
}
