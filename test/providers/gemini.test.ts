/**
 * Tests for the GeminiProvider (`generateContent`).
 */

import { afterEach, describe, expect, it } from "vitest";
import { geminiPlugin } from "../../src/providers/gemini.js";
import { calls, mockFetch, restoreFetch } from "./mock-server.js";

const GENERATE_URL = "https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-pro:generateContent";

const reply = {
	candidates: [
		{
			content: { parts: [{ text: "Bananas are " }, { text: "berries." }], role: "model" },
			finishReason: "STOP",
		},
	],
	usageMetadata: { promptTokenCount: 9, candidatesTokenCount: 4, totalTokenCount: 13 },
	modelVersion: "gemini-1.5-pro-002",
	responseId: "resp-7",
};

async function ready() {
	const provider = geminiPlugin.createProvider({ name: "gemini", apiKey: "test-secret" });
	expect(await provider.initialize()).toBe(true);
	return provider;
}

afterEach(() => {
	restoreFetch();
});

describe("GeminiProvider", () => {
	it("builds a generateContent request with a system instruction", async () => {
		mockFetch({ [GENERATE_URL]: { status: 200, body: reply } });
		const provider = await ready();

		await provider.generateMessage("Be brief.", "Tell me a fact.");

		expect(calls[0].url).toBe(GENERATE_URL);
		expect(calls[0].headers["x-goog-api-key"]).toBe("test-secret");
		expect(calls[0].body).toEqual({
			systemInstruction: { parts: [{ text: "Be brief." }] },
			contents: [{ role: "user", parts: [{ text: "Tell me a fact." }] }],
			generationConfig: { maxOutputTokens: 512, temperature: 0.7 },
		});
	});

	it("joins parts and maps usage metadata", async () => {
		mockFetch({ [GENERATE_URL]: { status: 200, body: reply } });
		const provider = await ready();

		const response = await provider.generateMessage("s", "u");

		expect(response).toEqual({
			content: "Bananas are berries.",
			providerName: "Gemini",
			model: "gemini-1.5-pro",
			usage: { promptTokens: 9, completionTokens: 4, totalTokens: 13 },
			metadata: { responseId: "resp-7", finishReason: "STOP", upstreamModel: "gemini-1.5-pro-002" },
		});
	});

	it("returns undefined when there are no candidates", async () => {
		mockFetch({ [GENERATE_URL]: { status: 200, body: { candidates: [] } } });
		const provider = await ready();

		expect(await provider.generateMessage("s", "u")).toBeUndefined();
	});

	it("returns undefined after one call on a server error", async () => {
		mockFetch({ [GENERATE_URL]: { status: 500, body: { error: { code: 500 } } } });
		const provider = await ready();

		expect(await provider.generateMessage("s", "u")).toBeUndefined();
		expect(calls).toHaveLength(1);
	});
});
