/**
 * snippet-ticker — Error taxonomy.
 *
 * Expected provider failures are converted to `undefined` / `false` at the
 * provider boundary; {@link TickerError} is what travels inside a provider
 * until that point, and what escapes for programmer errors
 * (`not_initialized`, `config`).
 * @module
 */

export type ErrorKind =
	| "config"
	| "plugin_load"
	| "not_initialized"
	| "provider_auth"
	| "provider_rate_limit"
	| "provider_not_found"
	| "provider_unavailable"
	| "provider_timeout"
	| "provider_response"
	| "unknown";

export interface TickerErrorPayload {
	kind: ErrorKind;
	message: string;
	provider?: string;
	upstreamStatus?: number;
	cause?: unknown;
}

export class TickerError extends Error {
	public readonly kind: ErrorKind;
	public readonly provider?: string;
	public readonly upstreamStatus?: number;
	public readonly cause?: unknown;

	constructor(payload: TickerErrorPayload) {
		super(payload.message);
		this.name = "TickerError";
		this.kind = payload.kind;
		this.provider = payload.provider;
		this.upstreamStatus = payload.upstreamStatus;
		this.cause = payload.cause;
	}
}

export function toTickerError(err: unknown, provider?: string): TickerError {
	if (err instanceof TickerError) {
		return err;
	}
	const message = err instanceof Error ? err.message : String(err);
	return new TickerError({
		kind: "unknown",
		message,
		provider,
		cause: err,
	});
}

export function classifyStatus(status?: number): ErrorKind {
	if (!status) {
		return "unknown";
	}
	if (status === 401 || status === 403) {
		return "provider_auth";
	}
	if (status === 404) {
		return "provider_not_found";
	}
	if (status === 429) {
		return "provider_rate_limit";
	}
	if (status >= 500 && status < 600) {
		return "provider_unavailable";
	}
	return "unknown";
}

/** Render any thrown value as a one-line message for logs. */
export function describeError(err: unknown): string {
	if (err instanceof TickerError && err.upstreamStatus) {
		return `${err.message} (HTTP ${err.upstreamStatus})`;
	}
	return err instanceof Error ? err.message : String(err);
}
