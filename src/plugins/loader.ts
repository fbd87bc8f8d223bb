/**
 * snippet-ticker — Custom plugin module loader.
 *
 * The only place that turns files into plugins. A plugin module is an ES
 * module exporting `plugin` (or `default`) as either a {@link ProviderPlugin}
 * or a plain `{ metadata, provider }` descriptor, where `provider` is a class
 * implementing the provider contract. Everything past this module deals in
 * {@link ProviderPlugin} only.
 * @module
 */

import { readdir } from "fs/promises";
import { basename, extname, join } from "path";
import { pathToFileURL } from "url";
import { z } from "zod";
import { TickerError, describeError } from "../errors.js";
import { ProviderPlugin } from "./plugin.js";
import { isProviderClass, missingProviderMembers } from "./registry.js";

const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

const PluginMetadataSchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
	author: z.string().min(1),
	description: z.string().min(1),
	requires: z.array(z.string()).default([]),
	category: z.enum(["builtin", "custom", "community"]).default("custom"),
	apiVersion: z.string().default("v1"),
	supportedFeatures: z.array(z.string()).default([]),
	defaults: z
		.object({
			baseUrl: z.string().optional(),
			model: z.string().optional(),
		})
		.optional(),
});

/** A plugin module file found on disk. */
export interface PluginFile {
	/** Registry name: the file name without extension. */
	name: string;
	path: string;
}

/**
 * List candidate plugin modules in `directory`.
 * Files starting with `_` and non-module extensions are skipped.
 */
export async function listPluginFiles(directory: string): Promise<PluginFile[]> {
	const entries = await readdir(directory, { withFileTypes: true });
	return entries
		.filter((entry) => entry.isFile() && !entry.name.startsWith("_") && PLUGIN_EXTENSIONS.has(extname(entry.name)))
		.map((entry) => ({
			name: basename(entry.name, extname(entry.name)),
			path: join(directory, entry.name),
		}))
		.sort((a, b) => a.name.localeCompare(b.name));
}

/** Turn one module export into a plugin, or explain why it is not one. */
export function toProviderPlugin(exported: unknown, source: string): ProviderPlugin {
	if (exported instanceof ProviderPlugin) {
		return exported;
	}
	if (typeof exported !== "object" || exported === null) {
		throw new TickerError({ kind: "plugin_load", message: `${source}: no plugin export found` });
	}

	const provider: unknown = Reflect.get(exported, "provider");
	if (!isProviderClass(provider)) {
		throw new TickerError({
			kind: "plugin_load",
			message: `${source}: provider class is missing ${missingProviderMembers(provider).join(", ")}`,
		});
	}

	const metadata = PluginMetadataSchema.safeParse(Reflect.get(exported, "metadata"));
	if (!metadata.success) {
		const issue = metadata.error.issues[0];
		throw new TickerError({
			kind: "plugin_load",
			message: `${source}: invalid metadata${issue ? ` (${issue.path.join(".")}: ${issue.message})` : ""}`,
		});
	}

	return new ProviderPlugin(provider, metadata.data);
}

/**
 * Import a plugin module and return the plugin it exports.
 *
 * @param fresh - Bypass the module cache so an edited file is picked up again.
 * @throws {TickerError} `plugin_load` when the file cannot be imported or exports no usable plugin.
 */
export async function loadPluginModule(filePath: string, options?: { fresh?: boolean }): Promise<ProviderPlugin> {
	const url = pathToFileURL(filePath);
	if (options?.fresh) {
		url.searchParams.set("t", String(Date.now()));
	}

	let mod: unknown;
	try {
		mod = await import(url.href);
	} catch (error: unknown) {
		throw new TickerError({
			kind: "plugin_load",
			message: `${filePath}: ${describeError(error)}`,
			cause: error,
		});
	}

	if (typeof mod !== "object" || mod === null) {
		throw new TickerError({ kind: "plugin_load", message: `${filePath}: not a module` });
	}
	const exported: unknown = Reflect.get(mod, "plugin") ?? Reflect.get(mod, "default");
	return toProviderPlugin(exported, filePath);
}
