/**
 * snippet-ticker — Together AI provider.
 *
 * Together serves open-weight models behind an OpenAI-compatible API.
 * @module
 */

import { ProviderPlugin } from "../plugins/plugin.js";
import { OpenAICompatibleProvider } from "./openai-compatible.js";

const SUPPORTED_MODELS = [
	"meta-llama/Llama-3.1-405B-Instruct-Turbo",
	"meta-llama/Llama-3.1-70B-Instruct-Turbo",
	"meta-llama/Llama-3.1-8B-Instruct-Turbo",
	"mistralai/Mixtral-8x7B-Instruct-v0.1",
	"mistralai/Mixtral-8x22B-Instruct-v0.1",
	"mistralai/Mistral-7B-Instruct-v0.3",
	"Qwen/Qwen2-72B-Instruct",
] as const;

export class TogetherProvider extends OpenAICompatibleProvider {
	get providerName(): string {
		return "Together";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}
}

export const togetherPlugin = new ProviderPlugin(TogetherProvider, {
	name: "Together AI Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "Together AI chat-completions provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion"],
	defaults: {
		baseUrl: "https://api.together.xyz/v1",
		model: "meta-llama/Llama-3.1-70B-Instruct-Turbo",
	},
});
