/**
 * snippet-ticker — You.com provider (Smart API).
 *
 * The Smart API takes a single `query` plus free-text `instructions`, answers
 * with search results alongside the text, and reports no token usage; usage
 * is estimated from word counts.
 * @module
 */

import { z } from "zod";
import { ProviderPlugin } from "../plugins/plugin.js";
import type { AIResponse } from "../types.js";
import { BaseProvider, type CompletionRequest } from "./base.js";

const SUPPORTED_MODELS = ["smart", "research", "default"] as const;

const HEALTH_INSTRUCTIONS = "Respond with a simple greeting.";

/** Search results kept as citations. */
const MAX_CITATIONS = 3;

const SmartResponseSchema = z.object({
	answer: z.string().optional(),
	search_results: z
		.array(
			z.object({
				url: z.string().optional(),
				name: z.string().optional(),
				snippet: z.string().optional(),
			}),
		)
		.optional(),
});

function wordCount(text: string): number {
	return text.split(/\s+/).filter(Boolean).length;
}

export class YouComProvider extends BaseProvider {
	get providerName(): string {
		return "You.com";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}

	protected authHeaders(apiKey: string | undefined): Record<string, string> {
		return apiKey ? { "x-api-key": apiKey } : {};
	}

	protected buildRequest(systemPrompt: string | undefined, userPrompt: string, _maxTokens: number): CompletionRequest {
		const query = systemPrompt === undefined ? userPrompt : `${systemPrompt}\n\nQuery: ${userPrompt}`;
		return {
			path: "/smart",
			body: {
				query,
				instructions: systemPrompt ?? HEALTH_INSTRUCTIONS,
				...this.config.extraParams,
			},
		};
	}

	protected parseResponse(data: unknown, request: CompletionRequest): AIResponse {
		const parsed = SmartResponseSchema.safeParse(data);
		if (!parsed.success) {
			throw this.malformed(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
		}

		const content = parsed.data.answer?.trim();
		if (!content) {
			throw this.malformed("No answer in response");
		}

		const results = parsed.data.search_results ?? [];
		const citations = results.slice(0, MAX_CITATIONS).map((result) => ({
			url: result.url ?? "",
			title: result.name ?? "",
			snippet: result.snippet ? `${result.snippet.slice(0, 200)}...` : "",
		}));
		const query = request.body.query;
		const promptTokens = typeof query === "string" ? wordCount(query) : 0;
		const completionTokens = wordCount(content);

		return {
			content,
			providerName: this.providerName,
			model: this.config.model,
			usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
			metadata: {
				searchResultsCount: results.length,
				citations,
			},
		};
	}
}

export const youcomPlugin = new ProviderPlugin(YouComProvider, {
	name: "You.com Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "You.com Smart API provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion", "search_augmented", "citations"],
	defaults: {
		baseUrl: "https://chat-api.you.com",
		model: "smart",
	},
});
