export { BaseProvider } from "./base.js";
export type { CompletionRequest } from "./base.js";
export { OpenAICompatibleProvider } from "./openai-compatible.js";
export { OpenRouterProvider, openrouterPlugin } from "./openrouter.js";
export { TogetherProvider, togetherPlugin } from "./together.js";
export { DeepInfraProvider, deepinfraPlugin } from "./deepinfra.js";
export { GroqProvider, groqPlugin } from "./groq.js";
export { MistralProvider, mistralPlugin } from "./mistral.js";
export { AnthropicProvider, anthropicPlugin } from "./anthropic.js";
export { GeminiProvider, geminiPlugin } from "./gemini.js";
export { YouComProvider, youcomPlugin } from "./youcom.js";

import type { ProviderPlugin } from "../plugins/plugin.js";
import { anthropicPlugin } from "./anthropic.js";
import { deepinfraPlugin } from "./deepinfra.js";
import { geminiPlugin } from "./gemini.js";
import { groqPlugin } from "./groq.js";
import { mistralPlugin } from "./mistral.js";
import { openrouterPlugin } from "./openrouter.js";
import { togetherPlugin } from "./together.js";
import { youcomPlugin } from "./youcom.js";

/**
 * Returns every built-in plugin keyed by its registry name.
 *
 * Iteration order is the default provider priority: the three
 * OpenAI-compatible gateways first, then the remaining vendors.
 */
export function getBuiltinPlugins(): Record<string, ProviderPlugin> {
	return {
		openrouter: openrouterPlugin,
		together: togetherPlugin,
		deepinfra: deepinfraPlugin,
		anthropic: anthropicPlugin,
		groq: groqPlugin,
		gemini: geminiPlugin,
		mistral: mistralPlugin,
		youcom: youcomPlugin,
	};
}

/**
 * Returns a single built-in plugin by registry name, or undefined if not found.
 *
 * Supported names: `"openrouter"`, `"together"`, `"deepinfra"`,
 * `"anthropic"`, `"groq"`, `"gemini"`, `"mistral"`, `"youcom"`.
 */
export function getBuiltinPlugin(name: string): ProviderPlugin | undefined {
	const plugins = getBuiltinPlugins();
	return Object.hasOwn(plugins, name) ? plugins[name] : undefined;
}
