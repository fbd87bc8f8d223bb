/**
 * snippet-ticker — Groq provider.
 * @module
 */

import { ProviderPlugin } from "../plugins/plugin.js";
import { OpenAICompatibleProvider } from "./openai-compatible.js";

const SUPPORTED_MODELS = [
	"llama-3.1-70b-versatile",
	"llama-3.1-8b-instant",
	"llama3-70b-8192",
	"llama3-8b-8192",
	"mixtral-8x7b-32768",
	"gemma2-9b-it",
] as const;

export class GroqProvider extends OpenAICompatibleProvider {
	get providerName(): string {
		return "Groq";
	}

	get supportedModels(): readonly string[] {
		return SUPPORTED_MODELS;
	}
}

export const groqPlugin = new ProviderPlugin(GroqProvider, {
	name: "Groq Provider",
	version: "1.0.0",
	author: "snippet-ticker",
	description: "Groq low-latency chat-completions provider",
	requires: [],
	category: "builtin",
	apiVersion: "v1",
	supportedFeatures: ["chat_completion", "fast_inference"],
	defaults: {
		baseUrl: "https://api.groq.com/openai/v1",
		model: "llama-3.1-70b-versatile",
	},
});
