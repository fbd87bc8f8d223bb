/**
 * snippet-ticker — Prompt profiles.
 *
 * A prompts file maps profile names to `{ system?, user? }`. The selected
 * profile fills in whatever it defines; explicit `systemPrompt`/`userPrompt`
 * settings win over the file; built-in defaults cover the rest.
 * @module
 */

import { z } from "zod";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { readJsonFile } from "./storage.js";
import type { TickerConfig } from "./types.js";

export const DEFAULT_SYSTEM_PROMPT =
	"You are an AI assistant. Provide a short, interesting, or thought-provoking statement about AI, technology, or the future.";
export const DEFAULT_USER_PROMPT = "Tell me something about AI.";

const PromptsFileSchema = z.record(
	z.object({
		system: z.string().min(1).optional(),
		user: z.string().min(1).optional(),
	}),
);

export interface Prompts {
	system: string;
	user: string;
}

const log = createLogger("prompts");

export class PromptManager {
	readonly profile: string;
	private prompts: Prompts;

	constructor(profile: string, prompts: Prompts) {
		this.profile = profile;
		this.prompts = prompts;
	}

	/** Resolve prompts for the configured profile. */
	static async load(config: Pick<TickerConfig, "promptsFile" | "promptProfile" | "systemPrompt" | "userPrompt">): Promise<PromptManager> {
		const fromFile = await readProfile(config.promptsFile, config.promptProfile);
		return new PromptManager(config.promptProfile, {
			system: config.systemPrompt ?? fromFile.system ?? DEFAULT_SYSTEM_PROMPT,
			user: config.userPrompt ?? fromFile.user ?? DEFAULT_USER_PROMPT,
		});
	}

	get systemPrompt(): string {
		return this.prompts.system;
	}

	get userPrompt(): string {
		return this.prompts.user;
	}
}

async function readProfile(file: string, profile: string): Promise<{ system?: string; user?: string }> {
	let raw: unknown;
	try {
		raw = await readJsonFile(file);
	} catch (error: unknown) {
		log.error(`Failed to load prompts file ${file}: ${describeError(error)}`);
		return {};
	}
	if (raw === undefined) {
		log.debug(`No prompts file at ${file}; using defaults`);
		return {};
	}

	const parsed = PromptsFileSchema.safeParse(raw);
	if (!parsed.success) {
		log.error(`Ignoring malformed prompts file ${file}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
		return {};
	}

	const selected = Object.hasOwn(parsed.data, profile) ? parsed.data[profile] : undefined;
	if (!selected) {
		log.warn(`Prompt profile "${profile}" not found in ${file}; using defaults`);
		return {};
	}
	log.info(`Loaded prompts for profile "${profile}"`);
	return selected;
}
