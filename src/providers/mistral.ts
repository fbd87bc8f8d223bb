/**
 * snippet-ticker — Mistral AI provider.
 *
 * Mistral's `/v1/chat/completions` follows the OpenAI request and response
 * shapes closely enough to share the same implementation.
 * @module
 */

import { ProviderPlugin } from "../plugins/plugin.js";
import { OpenAICompatibleProvider } from "./openai-compatible.js";

const SUPPORTED_MODELS = [
	"mistral-large-latest",
	"mistral-medium-latest",
	"mistral-small-latest",
	"codestral-latest",
	"open-mistral-7b",
	"open-mixtral-8x7b",
	"open-mixtral-8x22b",
] as const;

export class MistralProvider extends OpenAICompatibleProvider {
	get providerName(): string {
		return "Mistral";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}
}

export const mistralPlugin = new ProviderPlugin(MistralProvider, {
	name: "Mistral AI Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "Mistral AI chat-completions provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion"],
	defaults: {
		baseUrl: "https://api.mistral.ai/v1",
		model: "mistral-large-latest",
	},
});
