/**
 * snippet-ticker — PluginRegistry: the authoritative store of known plugins.
 *
 * Maps a unique plugin name to its {@link ProviderPlugin}. Every operation is
 * synchronous, so each one runs to completion on the event loop without
 * interleaving with another; that is what serializes register/unregister/
 * clear against export and validation. Read results are copies, never live
 * views of the internal map.
 * @module
 */

import { createRequire } from "node:module";
import { createLogger } from "../logger.js";
import type { PluginMetadata, ProviderClass, RegistryExport, RegistryValidation } from "../types.js";
import { ProviderPlugin } from "./plugin.js";

const EXPORT_FORMAT_VERSION = "1.0.0";

/** Members a provider class must expose on its prototype. */
const REQUIRED_PROVIDER_MEMBERS = [
	"providerName",
	"supportedModels",
	"initialize",
	"generateMessage",
	"healthCheck",
	"validateConfig",
] as const;

const REQUIRED_PROVIDER_METHODS = new Set<string>(["initialize", "generateMessage", "healthCheck", "validateConfig"]);

const REQUIRED_METADATA_FIELDS = ["name", "version", "author", "description"] as const;

const localRequire = createRequire(import.meta.url);

/** Whether `name` resolves as an installed package from this module. */
export function isModuleResolvable(name: string): boolean {
	try {
		localRequire.resolve(name);
		return true;
	} catch {
		return false;
	}
}

/**
 * List the capability members `value` is missing to count as a provider class.
 *
 * `providerName` and `supportedModels` must be accessors (or methods) on the
 * prototype chain; the four operations must be functions.
 */
export function missingProviderMembers(value: unknown): string[] {
	if (typeof value !== "function") {
		return ["constructor"];
	}
	const prototype: unknown = value.prototype;
	if (typeof prototype !== "object" || prototype === null) {
		return ["prototype"];
	}

	const missing: string[] = [];
	for (const member of REQUIRED_PROVIDER_MEMBERS) {
		if (!(member in prototype)) {
			missing.push(member);
			continue;
		}
		if (REQUIRED_PROVIDER_METHODS.has(member) && typeof Reflect.get(prototype, member) !== "function") {
			missing.push(member);
		}
	}
	return missing;
}

/** Type guard: `value` is a constructor implementing the provider contract. */
export function isProviderClass(value: unknown): value is ProviderClass {
	return missingProviderMembers(value).length === 0;
}

export interface PluginRegistryOptions {
	/** How a non-plugin dependency is looked up (default: package resolution). */
	isDependencyInstalled?: (name: string) => boolean;
}

export class PluginRegistry {
	private plugins: Map<string, ProviderPlugin> = new Map();
	private readonly isDependencyInstalled: (name: string) => boolean;
	private readonly log = createLogger("registry");

	constructor(options?: PluginRegistryOptions) {
		this.isDependencyInstalled = options?.isDependencyInstalled ?? isModuleResolvable;
	}

	// ---------------------------------------------------------------------------
	// Mutation
	// ---------------------------------------------------------------------------

	/**
	 * Register `plugin` under `name`.
	 * Returns false and leaves the registry untouched if the name is taken.
	 */
	registerPlugin(name: string, plugin: ProviderPlugin): boolean {
		if (this.plugins.has(name)) {
			this.log.warn(`Plugin ${name} is already registered`);
			return false;
		}
		this.plugins.set(name, plugin);
		this.log.info(`Registered plugin: ${name}`);
		return true;
	}

	unregisterPlugin(name: string): boolean {
		if (!this.plugins.delete(name)) {
			this.log.warn(`Plugin ${name} is not registered`);
			return false;
		}
		this.log.info(`Unregistered plugin: ${name}`);
		return true;
	}

	/**
	 * Swap the plugin registered under `name` for `plugin` in one step.
	 * Returns false if `name` was not registered.
	 */
	replacePlugin(name: string, plugin: ProviderPlugin): boolean {
		if (!this.plugins.has(name)) {
			return false;
		}
		this.plugins.set(name, plugin);
		this.log.info(`Replaced plugin: ${name}`);
		return true;
	}

	clear(): void {
		const count = this.plugins.size;
		this.plugins.clear();
		this.log.info(`Cleared ${count} plugins from registry`);
	}

	// ---------------------------------------------------------------------------
	// Lookup
	// ---------------------------------------------------------------------------

	getPlugin(name: string): ProviderPlugin | undefined {
		return this.plugins.get(name);
	}

	isRegistered(name: string): boolean {
		return this.plugins.has(name);
	}

	/** Copy of the name → plugin mapping, in registration order. */
	getAllPlugins(): Map<string, ProviderPlugin> {
		return new Map(this.plugins);
	}

	getPluginNames(): string[] {
		return Array.from(this.plugins.keys());
	}

	count(): number {
		return this.plugins.size;
	}

	/** Names of plugins whose provider class is called `className`. */
	findByProviderClass(className: string): string[] {
		const matches: string[] = [];
		for (const [name, plugin] of this.plugins) {
			if (plugin.providerClass.name === className) {
				matches.push(name);
			}
		}
		return matches;
	}

	/**
	 * Names of plugins whose metadata `key` equals `value`.
	 * For list-valued fields (`requires`, `supportedFeatures`) membership counts as a match.
	 */
	getPluginsByMetadata<K extends keyof PluginMetadata>(key: K, value: unknown): string[] {
		const matches: string[] = [];
		for (const [name, plugin] of this.plugins) {
			const field: unknown = plugin.metadata[key];
			const hit = Array.isArray(field) ? field.includes(value) : field === value;
			if (hit) {
				matches.push(name);
			}
		}
		return matches;
	}

	getPluginDependencies(name: string): string[] {
		return [...(this.plugins.get(name)?.requires ?? [])];
	}

	/**
	 * Report which of a plugin's declared dependencies are present.
	 *
	 * A dependency counts as available when it is another registered plugin
	 * or an installed package. Purely informational: nothing is installed and
	 * nothing fails.
	 */
	checkDependencies(name: string): Record<string, boolean> {
		const status: Record<string, boolean> = {};
		for (const dependency of this.getPluginDependencies(name)) {
			status[dependency] = this.plugins.has(dependency) || this.isDependencyInstalled(dependency);
		}
		return status;
	}

	/** Names of plugins that list `name` in their `requires`. */
	getDependentPlugins(name: string): string[] {
		const dependents: string[] = [];
		for (const [pluginName, plugin] of this.plugins) {
			if (plugin.requires.includes(name)) {
				dependents.push(pluginName);
			}
		}
		return dependents;
	}

	// ---------------------------------------------------------------------------
	// Validation
	// ---------------------------------------------------------------------------

	/**
	 * Structural check: the provider class implements the capability set and
	 * the metadata carries non-empty `name`, `version`, `author`, `description`.
	 */
	validatePlugin(plugin: ProviderPlugin): boolean {
		const missingMeta = REQUIRED_METADATA_FIELDS.filter((field) => {
			const value: unknown = plugin.metadata?.[field];
			return typeof value !== "string" || value.length === 0;
		});
		if (missingMeta.length > 0) {
			this.log.error(`Plugin missing required metadata field(s): ${missingMeta.join(", ")}`);
			return false;
		}

		const missing = missingProviderMembers(plugin.providerClass);
		if (missing.length > 0) {
			this.log.error(`Provider class for ${plugin.metadata.name} is missing: ${missing.join(", ")}`);
			return false;
		}
		return true;
	}

	/** Run {@link validatePlugin} over every entry. Invalid entries are reported, not removed. */
	validateRegistry(): RegistryValidation {
		const result: RegistryValidation = { valid: [], invalid: [] };
		for (const [name, plugin] of this.plugins) {
			if (this.validatePlugin(plugin)) {
				result.valid.push(name);
			} else {
				result.invalid.push(name);
			}
		}
		return result;
	}

	// ---------------------------------------------------------------------------
	// Serialization
	// ---------------------------------------------------------------------------

	/** Summary counts plus per-plugin descriptive fields. */
	getRegistryInfo(): {
		totalPlugins: number;
		pluginNames: string[];
		plugins: Record<string, { providerClass: string; version: string; author: string; description: string }>;
	} {
		const plugins: Record<string, { providerClass: string; version: string; author: string; description: string }> = {};
		for (const [name, plugin] of this.plugins) {
			plugins[name] = {
				providerClass: plugin.providerClass.name,
				version: plugin.version,
				author: plugin.author,
				description: plugin.description,
			};
		}
		return {
			totalPlugins: this.plugins.size,
			pluginNames: this.getPluginNames(),
			plugins,
		};
	}

	/** Deep, JSON-compatible snapshot of every registered plugin. */
	exportRegistry(): RegistryExport {
		const exported: RegistryExport = { version: EXPORT_FORMAT_VERSION, plugins: {} };
		for (const [name, plugin] of this.plugins) {
			exported.plugins[name] = {
				providerClassName: plugin.providerClass.name,
				version: plugin.version,
				author: plugin.author,
				description: plugin.description,
				requires: [...plugin.requires],
				metadata: structuredClone(plugin.metadata),
			};
		}
		return exported;
	}

	/**
	 * Re-register plugins from an {@link exportRegistry} snapshot.
	 *
	 * Classes are not serializable, so `resolveClass` maps each exported
	 * class name back to a constructor. Entries whose class cannot be
	 * resolved, or whose name is already taken, are skipped.
	 *
	 * @returns Names that were registered.
	 */
	importRegistry(data: RegistryExport, resolveClass: (className: string) => ProviderClass | undefined): string[] {
		const imported: string[] = [];
		for (const [name, entry] of Object.entries(data.plugins)) {
			const providerClass = resolveClass(entry.providerClassName);
			if (!providerClass) {
				this.log.warn(`Cannot import plugin ${name}: unknown provider class ${entry.providerClassName}`);
				continue;
			}
			if (this.registerPlugin(name, new ProviderPlugin(providerClass, structuredClone(entry.metadata)))) {
				imported.push(name);
			}
		}
		return imported;
	}
}
