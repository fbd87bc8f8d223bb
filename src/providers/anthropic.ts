/**
 * snippet-ticker — Anthropic provider (native Messages API).
 *
 * Anthropic does not speak the chat-completions dialect: the system prompt
 * is a top-level field, auth uses `x-api-key` plus a pinned
 * `anthropic-version`, and the reply arrives as a list of content blocks.
 * @module
 */

import { z } from "zod";
import { ProviderPlugin } from "../plugins/plugin.js";
import type { AIResponse } from "../types.js";
import { BaseProvider, type CompletionRequest } from "./base.js";

const ANTHROPIC_VERSION = "2023-06-01";

const SUPPORTED_MODELS = [
	"claude-3-5-sonnet-20241022",
	"claude-3-5-haiku-20241022",
	"claude-3-opus-20240229",
	"claude-3-haiku-20240307",
] as const;

const MessagesResponseSchema = z.object({
	id: z.string().optional(),
	model: z.string().optional(),
	content: z.array(
		z.object({
			type: z.string(),
			text: z.string().optional(),
		}),
	),
	stop_reason: z.string().nullable().optional(),
	usage: z
		.object({
			input_tokens: z.number().optional(),
			output_tokens: z.number().optional(),
		})
		.optional(),
});

export class AnthropicProvider extends BaseProvider {
	get providerName(): string {
		return "Anthropic";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}

	protected authHeaders(apiKey: string | undefined): Record<string, string> {
		return {
			...(apiKey ? { "x-api-key": apiKey } : {}),
			"anthropic-version": ANTHROPIC_VERSION,
		};
	}

	protected buildRequest(systemPrompt: string | undefined, userPrompt: string, maxTokens: number): CompletionRequest {
		return {
			path: "/v1/messages",
			body: {
				model: this.config.model,
				max_tokens: maxTokens,
				temperature: this.config.temperature,
				...(systemPrompt === undefined ? {} : { system: systemPrompt }),
				messages: [{ role: "user", content: userPrompt }],
				...this.config.extraParams,
			},
		};
	}

	protected parseResponse(data: unknown): AIResponse {
		const parsed = MessagesResponseSchema.safeParse(data);
		if (!parsed.success) {
			throw this.malformed(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
		}

		const message = parsed.data;
		const content = message.content
			.filter((block) => block.type === "text")
			.map((block) => block.text ?? "")
			.join("")
			.trim();
		if (!content) {
			throw this.malformed("Empty content in response");
		}

		const input = message.usage?.input_tokens ?? 0;
		const output = message.usage?.output_tokens ?? 0;

		return {
			content,
			providerName: this.providerName,
			model: this.config.model,
			usage: { promptTokens: input, completionTokens: output, totalTokens: input + output },
			metadata: {
				responseId: message.id,
				finishReason: message.stop_reason ?? undefined,
				upstreamModel: message.model,
			},
		};
	}
}

export const anthropicPlugin = new ProviderPlugin(AnthropicProvider, {
	name: "Anthropic Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "Anthropic Messages API provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion"],
	defaults: {
		baseUrl: "https://api.anthropic.com",
		model: "claude-3-5-sonnet-20241022",
	},
});
