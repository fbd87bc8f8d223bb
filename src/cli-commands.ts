/**
 * cli-commands.ts — Command implementations for the ticker CLI.
 *
 * Each exported `cmd*` function corresponds to a top-level CLI sub-command.
 * Formatting utilities are imported from `./cli-format.js` to keep
 * presentation logic separate from command orchestration.
 *
 * @module cli-commands
 */

import { TickerClient } from "./client.js";
import { loadConfig } from "./config.js";
import { PluginManager } from "./plugins/manager.js";
import { PromptManager } from "./prompts.js";
import type { TickerConfig } from "./types.js";
import {
	BOLD, CYAN, DIM, RED, YELLOW,
	c, formatStatus, line, renderTable, truncate,
} from "./cli-format.js";

/** CLI version string — kept in sync with `package.json`. */
export const VERSION = "0.1.0";

export type Flags = Record<string, string | boolean>;

/** Parse a numeric flag, or exit with a message when it is not a number. */
function numberFlag(flags: Flags, key: string): number | undefined {
	const value = flags[key];
	if (typeof value !== "string") return undefined;
	const n = Number(value);
	if (!Number.isFinite(n)) {
		console.error(c(RED, `Invalid --${key}: ${value}`));
		process.exit(1);
	}
	return n;
}

async function withClient<T>(config: TickerConfig, run: (client: TickerClient) => Promise<T>): Promise<T> {
	const client = await TickerClient.create(config);
	try {
		return await run(client);
	} finally {
		await client.close();
	}
}

// ── message ──────────────────────────────────────────────────────────────

/**
 * Fetch one message the same way the web route does: cache roll, provider
 * failover, then an archived message as last resort.
 *
 * @param flags  CLI flags (supports `--threshold`, `--json`).
 */
export async function cmdMessage(flags: Flags): Promise<void> {
	const threshold = numberFlag(flags, "threshold");
	const config = await loadConfig(process.env, threshold === undefined ? undefined : { fuzzyThreshold: threshold });
	const prompts = await PromptManager.load(config);

	const result = await withClient(config, async (client) => {
		const result = await client.requestMessage(prompts.systemPrompt, prompts.userPrompt, [], config.fuzzyThreshold, {
			checkWholeCache: true,
		});
		return result ?? await client.archiveMessage();
	});

	if (flags.json) {
		console.log(JSON.stringify(result ?? null, null, 2));
		return;
	}
	if (!result) {
		console.error(c(RED, "No message available. Check that at least one provider API key is set."));
		process.exit(1);
	}

	console.log(result.message);
	const origin = result.provider ? `${result.source} (${result.provider})` : result.source;
	console.log(c(DIM, `\nsource: ${origin}`));
}

// ── providers ────────────────────────────────────────────────────────────

/**
 * List the configured providers with their model and endpoint.
 *
 * @param flags  CLI flags (supports `--json`).
 */
export async function cmdProviders(flags: Flags): Promise<void> {
	const config = await loadConfig();
	const { available, info } = await withClient(config, async (client) => ({
		available: client.getAvailableProviders(),
		info: client.getProviderInfo(),
	}));

	if (flags.json) {
		console.log(JSON.stringify({ available, info }, null, 2));
		return;
	}

	const names = Object.keys(info);
	if (names.length === 0) {
		console.log(c(YELLOW, "No providers configured. Set an API key such as OPENROUTER_API_KEY."));
		return;
	}

	const rows = names.map((name) => {
		const entry = info[name];
		if ("error" in entry) {
			return [c(CYAN, name), c(RED, entry.error), "", ""];
		}
		return [c(CYAN, name), entry.name, truncate(entry.model, 36), truncate(entry.baseUrl, 40)];
	});

	console.log(renderTable([
		{ header: "Name", width: 12 },
		{ header: "Provider", width: 12 },
		{ header: "Model", width: 36 },
		{ header: "Base URL", width: 40 },
	], rows));
	console.log(c(DIM, "\n" + line("─", 50)));
	console.log(`${c(BOLD, String(names.length))} providers in priority order (strategy: ${config.strategy})`);
}

// ── plugins ──────────────────────────────────────────────────────────────

/**
 * List registered plugins, or enable/disable one.
 *
 * `ticker plugins` lists; `ticker plugins enable <name>` and
 * `ticker plugins disable <name>` update the plugin settings file.
 *
 * @param action  `"enable"`, `"disable"` or undefined to list.
 * @param name    Plugin name for enable/disable.
 * @param flags   CLI flags (supports `--json`).
 */
export async function cmdPlugins(action: string | undefined, name: string | undefined, flags: Flags): Promise<void> {
	const config = await loadConfig();

	if (action === "enable" || action === "disable") {
		if (!name) {
			console.error(c(RED, `Usage: ticker plugins ${action} <name>`));
			process.exit(1);
		}
		if (!config.pluginSettingsFile) {
			console.error(c(YELLOW, "PLUGIN_SETTINGS_FILE is not set; the change will not persist."));
		}
		const manager = await PluginManager.create({
			pluginDirectory: config.pluginDirectory,
			settingsFile: config.pluginSettingsFile,
		});
		await (action === "enable" ? manager.enablePlugin(name) : manager.disablePlugin(name));
		console.log(`${formatStatus(action === "enable")} ${name} ${action}d`);
		return;
	}
	if (action) {
		console.error(c(RED, `Unknown plugins action: "${action}"`));
		process.exit(1);
	}

	const { plugins, validation } = await withClient(config, async (client) => {
		const manager = client.getManager();
		return { plugins: manager.getPluginList(), validation: manager.getRegistry().validateRegistry() };
	});

	if (flags.json) {
		console.log(JSON.stringify({ plugins, validation }, null, 2));
		return;
	}

	const invalid = new Set(validation.invalid);
	const rows = plugins.map((p) => [
		c(CYAN, p.name),
		p.pluginInfo.version,
		p.pluginInfo.metadata.category,
		formatStatus(p.enabled && !invalid.has(p.name)),
		truncate(p.pluginInfo.description, 48),
	]);

	console.log(renderTable([
		{ header: "Plugin", width: 14 },
		{ header: "Version", width: 8 },
		{ header: "Category", width: 10 },
		{ header: "OK", width: 3 },
		{ header: "Description", width: 48 },
	], rows));
}

// ── health ───────────────────────────────────────────────────────────────

/**
 * Health-check every configured provider.
 *
 * @param flags  CLI flags (supports `--json`).
 */
export async function cmdHealth(flags: Flags): Promise<void> {
	const config = await loadConfig();
	if (!flags.json) console.log(c(DIM, "Checking providers..."));
	const health = await withClient(config, (client) => client.healthCheckAll());

	if (flags.json) {
		console.log(JSON.stringify(health, null, 2));
		return;
	}

	const entries = Object.entries(health);
	for (const [name, ok] of entries) {
		console.log(`  ${formatStatus(ok, c(CYAN, name))}`);
	}
	const healthy = entries.filter(([, ok]) => ok).length;
	console.log(c(DIM, "\n" + line("─", 50)));
	console.log(`${c(BOLD, String(healthy))} of ${c(BOLD, String(entries.length))} providers healthy`);
}

// ── serve ────────────────────────────────────────────────────────────────

/**
 * Start the HTTP API server.
 *
 * @param flags  CLI flags (supports `--port`).
 */
export async function cmdServe(flags: Flags): Promise<void> {
	const port = numberFlag(flags, "port");
	if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
		console.error(c(RED, `Invalid port: ${flags.port}`));
		process.exit(1);
	}

	const config = await loadConfig(process.env, port === undefined ? undefined : { port });

	// Dynamic import keeps Hono out of the critical path for non-serve commands
	const { startServer } = await import("./server.js");
	await startServer(config);
}

// ── help & version ───────────────────────────────────────────────────────

/** Print the full CLI usage / help text to stdout. */
export function showHelp(): void {
	console.log(`
${c(BOLD, "ticker")} ${c(DIM, "— AI snippet ticker")}

${c(BOLD, "USAGE")}
  ticker <command> [options]

${c(BOLD, "COMMANDS")}
  ${c(CYAN, "message")}                       Print one message
    --threshold <0-100>           Fuzzy-duplicate threshold
  ${c(CYAN, "providers")}                     List configured providers
  ${c(CYAN, "plugins")}                       List registered plugins
  ${c(CYAN, "plugins enable")} <name>         Enable a plugin
  ${c(CYAN, "plugins disable")} <name>        Disable (and unload) a plugin
  ${c(CYAN, "health")}                        Health-check every provider
  ${c(CYAN, "serve")} [--port 3000]           Start HTTP API server

${c(BOLD, "OPTIONS")}
  --json                          Output as JSON (works with any command)
  --verbose                       Show info-level logs
  --help                          Show this help message
  --version                       Show version

${c(BOLD, "EXAMPLES")}
  ${c(DIM, "$")} OPENROUTER_API_KEY=... ticker message
  ${c(DIM, "$")} ticker message --threshold 70 --json
  ${c(DIM, "$")} ticker plugins disable groq
  ${c(DIM, "$")} ticker serve --port 8080
`.trim());
}

/** Print the CLI version string to stdout. */
export function showVersion(): void {
	console.log(`snippet-ticker v${VERSION}`);
}
