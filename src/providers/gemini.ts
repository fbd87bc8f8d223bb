/**
 * snippet-ticker — Google Gemini provider (`generateContent` REST API).
 * @module
 */

import { z } from "zod";
import { ProviderPlugin } from "../plugins/plugin.js";
import type { AIResponse } from "../types.js";
import { BaseProvider, type CompletionRequest } from "./base.js";

const SUPPORTED_MODELS = [
	"gemini-1.5-pro",
	"gemini-1.5-pro-latest",
	"gemini-1.5-flash",
	"gemini-1.5-flash-latest",
	"gemini-2.0-flash",
] as const;

const GenerateContentSchema = z.object({
	candidates: z
		.array(
			z.object({
				content: z
					.object({
						parts: z.array(z.object({ text: z.string().optional() })).optional(),
					})
					.optional(),
				finishReason: z.string().optional(),
			}),
		)
		.optional(),
	usageMetadata: z
		.object({
			promptTokenCount: z.number().optional(),
			candidatesTokenCount: z.number().optional(),
			totalTokenCount: z.number().optional(),
		})
		.optional(),
	modelVersion: z.string().optional(),
	responseId: z.string().optional(),
});

export class GeminiProvider extends BaseProvider {
	get providerName(): string {
		return "Gemini";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}

	protected authHeaders(apiKey: string | undefined): Record<string, string> {
		return apiKey ? { "x-goog-api-key": apiKey } : {};
	}

	protected buildRequest(systemPrompt: string | undefined, userPrompt: string, maxTokens: number): CompletionRequest {
		return {
			path: `/v1beta/models/${encodeURIComponent(this.config.model)}:generateContent`,
			body: {
				...(systemPrompt === undefined ? {} : { systemInstruction: { parts: [{ text: systemPrompt }] } }),
				contents: [{ role: "user", parts: [{ text: userPrompt }] }],
				generationConfig: {
					maxOutputTokens: maxTokens,
					temperature: this.config.temperature,
				},
				...this.config.extraParams,
			},
		};
	}

	protected parseResponse(data: unknown): AIResponse {
		const parsed = GenerateContentSchema.safeParse(data);
		if (!parsed.success) {
			throw this.malformed(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
		}

		const candidate = parsed.data.candidates?.[0];
		if (!candidate) {
			throw this.malformed("No candidates in response");
		}

		const content = (candidate.content?.parts ?? [])
			.map((part) => part.text ?? "")
			.join("")
			.trim();
		if (!content) {
			throw this.malformed("Empty content in response");
		}

		const usage = parsed.data.usageMetadata;
		return {
			content,
			providerName: this.providerName,
			model: this.config.model,
			usage: usage
				? {
					promptTokens: usage.promptTokenCount ?? 0,
					completionTokens: usage.candidatesTokenCount ?? 0,
					totalTokens: usage.totalTokenCount ?? 0,
				}
				: {},
			metadata: {
				responseId: parsed.data.responseId,
				finishReason: candidate.finishReason,
				upstreamModel: parsed.data.modelVersion,
			},
		};
	}
}

export const geminiPlugin = new ProviderPlugin(GeminiProvider, {
	name: "Google Gemini Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "Google Gemini generateContent provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1beta",
	supportedFeatures: ["chat_completion"],
	defaults: {
		baseUrl: "https://generativelanguage.googleapis.com",
		model: "gemini-1.5-pro",
	},
});
