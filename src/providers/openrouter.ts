/**
 * snippet-ticker — OpenRouter provider.
 *
 * OpenRouter is a unified gateway that proxies requests to many upstream
 * model vendors (OpenAI, Anthropic, Google, Meta, Mistral, etc.) behind one
 * OpenAI-compatible endpoint. Model IDs are namespaced by vendor
 * (`"openai/gpt-4o"`).
 * @module
 */

import { ProviderPlugin } from "../plugins/plugin.js";
import { OpenAICompatibleProvider } from "./openai-compatible.js";

const SUPPORTED_MODELS = [
	"openai/gpt-4o",
	"openai/gpt-4o-mini",
	"openai/gpt-4-turbo",
	"anthropic/claude-3.5-sonnet",
	"anthropic/claude-3-haiku",
	"meta-llama/llama-3.1-405b-instruct",
	"meta-llama/llama-3.1-70b-instruct",
	"meta-llama/llama-3.1-8b-instruct",
	"google/gemini-pro-1.5",
	"mistralai/mistral-large",
	"qwen/qwen-2-72b-instruct",
] as const;

export class OpenRouterProvider extends OpenAICompatibleProvider {
	get providerName(): string {
		return "OpenRouter";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}

	/** Adds OpenRouter's app attribution header; config headers still win. */
	protected authHeaders(apiKey: string | undefined): Record<string, string> {
		return {
			...super.authHeaders(apiKey),
			"X-Title": "snippet-ticker",
		};
	}
}

export const openrouterPlugin = new ProviderPlugin(OpenRouterProvider, {
	name: "OpenRouter Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "OpenRouter gateway provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion", "multi_vendor"],
	defaults: {
		baseUrl: "https://openrouter.ai/api/v1",
		model: "openai/gpt-4o",
	},
});
