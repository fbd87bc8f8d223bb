/**
 * snippet-ticker — Leveled console logging.
 *
 * Every module gets a scoped logger via {@link createLogger}. Output goes to
 * the console with an ISO timestamp; the threshold comes from `LOG_LEVEL`
 * and can be changed at runtime with {@link setLogLevel}.
 * @module
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function parseLevel(value: string | undefined): LogLevel {
	const normalized = value?.trim().toLowerCase();
	return normalized && isLogLevel(normalized) ? normalized : "info";
}

let currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getLogLevel(): LogLevel {
	return currentLevel;
}

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string): void {
	if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
	const line = `[${new Date().toISOString()}] ${level.toUpperCase()} [${scope}] ${message}`;
	if (level === "warn" || level === "error") {
		console.error(line);
	} else {
		console.log(line);
	}
}

/**
 * Create a logger whose lines are tagged with `scope`.
 *
 * @example
 * ```ts
 * const log = createLogger("registry");
 * log.warn("Plugin openrouter is already registered");
 * ```
 */
export function createLogger(scope: string): Logger {
	return {
		debug: (message) => write("debug", scope, message),
		info: (message) => write("info", scope, message),
		warn: (message) => write("warn", scope, message),
		error: (message) => write("error", scope, message),
	};
}
