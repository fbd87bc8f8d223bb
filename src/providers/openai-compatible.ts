/**
 * snippet-ticker — Shared implementation for OpenAI-style chat-completions APIs.
 *
 * OpenRouter, Together, DeepInfra, Groq and Mistral all accept the same
 * `POST {baseUrl}/chat/completions` body and answer with a `choices` array,
 * so they only differ in identity, defaults and the occasional header.
 * @module
 */

import { z } from "zod";
import type { AIResponse } from "../types.js";
import { BaseProvider, type CompletionRequest } from "./base.js";

const ChatCompletionSchema = z.object({
	id: z.string().optional(),
	created: z.number().optional(),
	model: z.string().optional(),
	choices: z.array(
		z.object({
			message: z.object({
				content: z.string().nullable().optional(),
			}),
			finish_reason: z.string().nullable().optional(),
		}),
	),
	usage: z
		.object({
			prompt_tokens: z.number().optional(),
			completion_tokens: z.number().optional(),
			total_tokens: z.number().optional(),
		})
		.nullable()
		.optional(),
});

export abstract class OpenAICompatibleProvider extends BaseProvider {
	protected buildRequest(systemPrompt: string | undefined, userPrompt: string, maxTokens: number): CompletionRequest {
		const messages = systemPrompt === undefined
			? [{ role: "user", content: userPrompt }]
			: [
				{ role: "system", content: systemPrompt },
				{ role: "user", content: userPrompt },
			];

		return {
			path: "/chat/completions",
			body: {
				model: this.config.model,
				messages,
				max_tokens: maxTokens,
				temperature: this.config.temperature,
				...this.config.extraParams,
			},
		};
	}

	protected authHeaders(apiKey: string | undefined): Record<string, string> {
		return apiKey ? { Authorization: `Bearer ${apiKey}` } : {};
	}

	protected parseResponse(data: unknown): AIResponse {
		const parsed = ChatCompletionSchema.safeParse(data);
		if (!parsed.success) {
			throw this.malformed(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
		}

		const completion = parsed.data;
		const choice = completion.choices[0];
		if (!choice) {
			throw this.malformed("No choices in response");
		}

		const content = choice.message.content?.trim();
		if (!content) {
			throw this.malformed("Empty content in response");
		}

		const usage: Record<string, number> = {};
		if (completion.usage) {
			usage.promptTokens = completion.usage.prompt_tokens ?? 0;
			usage.completionTokens = completion.usage.completion_tokens ?? 0;
			usage.totalTokens = completion.usage.total_tokens ?? 0;
		}

		return {
			content,
			providerName: this.providerName,
			model: this.config.model,
			usage,
			metadata: {
				responseId: completion.id,
				created: completion.created,
				finishReason: choice.finish_reason ?? undefined,
				upstreamModel: completion.model,
			},
		};
	}
}
