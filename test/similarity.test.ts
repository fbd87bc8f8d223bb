import { describe, expect, it } from "vitest";
import { findSimilar, isSimilar, ratio } from "../src/similarity.js";

describe("ratio", () => {
	it("scores identical strings 100", () => {
		expect(ratio("Robots dream in binary.", "Robots dream in binary.")).toBe(100);
	});

	it("scores two empty strings 100 and empty against non-empty 0", () => {
		expect(ratio("", "")).toBe(100);
		expect(ratio("abc", "")).toBe(0);
		expect(ratio("", "abc")).toBe(0);
	});

	it("is twice the common subsequence over the combined length", () => {
		expect(ratio("abcd", "abce")).toBe(75);
		expect(ratio("kitten", "sitting")).toBeCloseTo((200 * 4) / 13);
	});

	it("is symmetric", () => {
		const a = "Neural networks learn from examples.";
		const b = "Neural nets learn by example.";
		expect(ratio(a, b)).toBe(ratio(b, a));
	});

	it("counts code points, not UTF-16 units", () => {
		expect(ratio("🤖a", "🤖b")).toBe(50);
	});

	it("scores unrelated text low", () => {
		expect(ratio("Quantum computers use qubits.", "Bananas are berries.")).toBeLessThan(60);
	});
});

describe("findSimilar / isSimilar", () => {
	const existing = ["AI will write most code by 2030.", "Transformers changed language modeling."];

	it("returns the first match at or above the threshold", () => {
		expect(findSimilar("AI will write most code by 2031.", existing, 85)).toBe(existing[0]);
		expect(isSimilar("AI will write most code by 2031.", existing, 85)).toBe(true);
	});

	it("rejects exact duplicates", () => {
		expect(isSimilar(existing[1], existing, 100)).toBe(true);
	});

	it("accepts novel text", () => {
		expect(findSimilar("Chess engines search millions of positions.", existing, 85)).toBeUndefined();
		expect(isSimilar("anything", [], 0)).toBe(false);
	});
});
