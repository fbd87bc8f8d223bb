/**
 * snippet-ticker — Base provider abstraction.
 *
 * Supplies config validation, the initialize/ready lifecycle, a single-shot
 * JSON POST with timeout, and the failure-to-`undefined` conversion that
 * every concrete provider inherits. Subclasses describe how to build a
 * request and how to read the upstream response.
 * @module
 */

import { TickerError, classifyStatus, describeError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { AIResponse, Provider, ProviderDescription, ResolvedProviderConfig } from "../types.js";

/** Upper bound for health checks, in milliseconds. */
const HEALTH_CHECK_TIMEOUT_MS = 10_000;

function isAbort(error: unknown): boolean {
	return error instanceof DOMException && error.name === "AbortError";
}

/** A request ready to be POSTed, relative to `config.baseUrl`. */
export interface CompletionRequest {
	path: string;
	body: Record<string, unknown>;
}

/**
 * Abstract base class for all HTTP providers.
 *
 * Subclasses implement the two identity accessors plus
 * {@link buildRequest}, {@link parseResponse} and {@link authHeaders};
 * the base class handles everything else.
 */
export abstract class BaseProvider implements Provider {
	abstract get providerName(): string;
	abstract get supportedModels(): readonly string[];

	readonly config: ResolvedProviderConfig;
	protected readonly log: Logger;

	/** Request headers built by {@link initialize}; `undefined` until then. */
	private headers: Record<string, string> | undefined;

	constructor(config: ResolvedProviderConfig) {
		this.config = config;
		this.log = createLogger(`provider:${config.name}`);
	}

	/** Whether requests without an API key are acceptable. */
	protected get allowsAnonymous(): boolean {
		return false;
	}

	/** Whether {@link initialize} has completed successfully. */
	get initialized(): boolean {
		return this.headers !== undefined;
	}

	/**
	 * Build the upstream request for one completion.
	 * @param systemPrompt - Omitted for health checks.
	 */
	protected abstract buildRequest(systemPrompt: string | undefined, userPrompt: string, maxTokens: number): CompletionRequest;

	/**
	 * Convert a parsed JSON body into an {@link AIResponse}.
	 * Throws a `provider_response` {@link TickerError} when the body is unusable.
	 */
	protected abstract parseResponse(data: unknown, request: CompletionRequest): AIResponse;

	/** Authentication headers for the given key. */
	protected abstract authHeaders(apiKey: string | undefined): Record<string, string>;

	validateConfig(): boolean {
		const { name, apiKey, model, baseUrl } = this.config;

		if (!name) {
			this.log.error("Provider name is required");
			return false;
		}
		if (!apiKey && !this.allowsAnonymous) {
			this.log.error("API key is required");
			return false;
		}
		if (!model) {
			this.log.error("Model is required");
			return false;
		}
		if (!baseUrl) {
			this.log.error("Base URL is required");
			return false;
		}
		if (!/^https?:\/\//.test(baseUrl)) {
			this.log.error(`${this.providerName} base URL must start with http:// or https://`);
			return false;
		}
		if (!this.supportedModels.includes(model)) {
			this.log.warn(`Model ${model} is not in the known ${this.providerName} model list; it may still work`);
		}
		return true;
	}

	async initialize(): Promise<boolean> {
		if (!this.validateConfig()) {
			return false;
		}
		try {
			this.headers = {
				"content-type": "application/json",
				...this.authHeaders(this.config.apiKey),
				...this.config.extraHeaders,
			};
			this.log.info(`Initialized ${this.providerName} with model ${this.config.model}`);
			return true;
		} catch (error: unknown) {
			this.log.error(`Failed to initialize ${this.providerName}: ${describeError(error)}`);
			return false;
		}
	}

	async generateMessage(systemPrompt: string, userPrompt: string): Promise<AIResponse | undefined> {
		const headers = this.requireHeaders();
		try {
			const request = this.buildRequest(systemPrompt, userPrompt, this.config.maxTokens);
			const data = await this.postJSON(request, headers, this.config.timeout * 1000);
			return this.parseResponse(data, request);
		} catch (error: unknown) {
			this.log.error(`${this.providerName} API error: ${describeError(error)}`);
			return undefined;
		}
	}

	async healthCheck(): Promise<boolean> {
		if (!this.headers) {
			return false;
		}
		try {
			const request = this.buildRequest(undefined, "Hello", 1);
			await this.postJSON(request, this.headers, Math.min(this.config.timeout * 1000, HEALTH_CHECK_TIMEOUT_MS));
			return true;
		} catch (error: unknown) {
			this.log.warn(`${this.providerName} health check failed: ${describeError(error)}`);
			return false;
		}
	}

	getInfo(): ProviderDescription {
		return {
			name: this.providerName,
			configName: this.config.name,
			model: this.config.model,
			supportedModels: this.supportedModels,
			baseUrl: this.config.baseUrl,
			timeout: this.config.timeout,
			maxTokens: this.config.maxTokens,
		};
	}

	/** Shorthand for a `provider_response` error tagged with this provider. */
	protected malformed(message: string): TickerError {
		return new TickerError({ kind: "provider_response", message, provider: this.providerName });
	}

	/**
	 * POST a JSON body with a timeout, exactly once.
	 *
	 * Non-2xx statuses, aborts and unparseable bodies all throw a
	 * {@link TickerError}; the caller decides what that means.
	 */
	protected async postJSON(request: CompletionRequest, headers: Record<string, string>, timeoutMs: number): Promise<unknown> {
		const url = `${this.config.baseUrl.replace(/\/+$/, "")}${request.path}`;
		const controller = new AbortController();
		const timer = setTimeout(() => controller.abort(), timeoutMs);

		try {
			const response = await fetch(url, {
				method: "POST",
				headers,
				body: JSON.stringify(request.body),
				signal: controller.signal,
			});

			if (!response.ok) {
				const text = await response.text().catch(() => "");
				throw new TickerError({
					kind: classifyStatus(response.status),
					message: `${response.status} ${response.statusText}${text ? `: ${text.slice(0, 200)}` : ""}`,
					provider: this.providerName,
					upstreamStatus: response.status,
				});
			}

			try {
				return await response.json();
			} catch (error: unknown) {
				if (isAbort(error)) throw error;
				throw new TickerError({
					kind: "provider_response",
					message: "Response body is not valid JSON",
					provider: this.providerName,
					cause: error,
				});
			}
		} catch (error: unknown) {
			if (isAbort(error)) {
				throw new TickerError({
					kind: "provider_timeout",
					message: `Request timed out after ${timeoutMs}ms`,
					provider: this.providerName,
					cause: error,
				});
			}
			throw error;
		} finally {
			clearTimeout(timer);
		}
	}

	private requireHeaders(): Record<string, string> {
		if (!this.headers) {
			throw new TickerError({
				kind: "not_initialized",
				message: `${this.providerName} provider used before initialize() succeeded`,
				provider: this.providerName,
			});
		}
		return this.headers;
	}
}
