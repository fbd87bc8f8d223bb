import { describe, expect, it } from "vitest";
import { TickerError, classifyStatus, describeError, toTickerError } from "../src/errors.js";

describe("classifyStatus", () => {
	it.each<[number | undefined, string]>([
		[401, "provider_auth"],
		[403, "provider_auth"],
		[404, "provider_not_found"],
		[429, "provider_rate_limit"],
		[500, "provider_unavailable"],
		[503, "provider_unavailable"],
		[400, "unknown"],
		[undefined, "unknown"],
	])("maps %s to %s", (status, kind) => {
		expect(classifyStatus(status)).toBe(kind);
	});
});

describe("toTickerError", () => {
	it("passes TickerErrors through", () => {
		const error = new TickerError({ kind: "config", message: "bad" });
		expect(toTickerError(error)).toBe(error);
	});

	it("wraps anything else as unknown", () => {
		const cause = new Error("socket hang up");
		const wrapped = toTickerError(cause, "groq");

		expect(wrapped).toBeInstanceOf(TickerError);
		expect(wrapped).toMatchObject({ kind: "unknown", message: "socket hang up", provider: "groq", cause });
		expect(toTickerError("plain").message).toBe("plain");
	});
});

describe("describeError", () => {
	it("appends the upstream status when there is one", () => {
		const error = new TickerError({ kind: "provider_rate_limit", message: "Groq request failed", upstreamStatus: 429 });
		expect(describeError(error)).toBe("Groq request failed (HTTP 429)");
	});

	it("uses the message of plain errors and stringifies the rest", () => {
		expect(describeError(new Error("boom"))).toBe("boom");
		expect(describeError(42)).toBe("42");
	});
});
