/**
 * snippet-ticker — DeepInfra provider (OpenAI-compatible endpoint under `/v1/openai`).
 * @module
 */

import { ProviderPlugin } from "../plugins/plugin.js";
import { OpenAICompatibleProvider } from "./openai-compatible.js";

const SUPPORTED_MODELS = [
	"meta-llama/Meta-Llama-3.1-405B-Instruct",
	"meta-llama/Meta-Llama-3.1-70B-Instruct",
	"meta-llama/Meta-Llama-3.1-8B-Instruct",
	"mistralai/Mixtral-8x7B-Instruct-v0.1",
	"mistralai/Mistral-7B-Instruct-v0.3",
	"microsoft/WizardLM-2-8x22B",
	"Qwen/Qwen2-72B-Instruct",
	"google/gemma-1.1-7b-it",
] as const;

export class DeepInfraProvider extends OpenAICompatibleProvider {
	get providerName(): string {
		return "DeepInfra";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}
}

export const deepinfraPlugin = new ProviderPlugin(DeepInfraProvider, {
	name: "DeepInfra Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "DeepInfra chat-completions provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion"],
	defaults: {
		baseUrl: "https://api.deepinfra.com/v1/openai",
		model: "meta-llama/Meta-Llama-3.1-70B-Instruct",
	},
});
