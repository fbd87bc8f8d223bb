/**
 * snippet-ticker — Bounded, file-backed message cache.
 *
 * Holds every accepted message with its timestamps, in insertion order, plus
 * a short list of the most recently served messages. Capacity is enforced by
 * evicting the oldest insertion. The whole cache lives in one JSON document
 * that is rewritten atomically after each mutation; writes are queued so
 * concurrent requests never lose each other's updates.
 * @module
 */

import { z } from "zod";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { isSimilar } from "./similarity.js";
import { SerialQueue, readJsonFile, writeJsonAtomic } from "./storage.js";
import type { CacheSettings, CachedMessageMeta } from "./types.js";

const CACHE_FORMAT_VERSION = 1;

const CacheDocumentSchema = z.union([
	// Legacy layout: a bare list of messages.
	z.array(z.string()),
	z.object({
		version: z.literal(CACHE_FORMAT_VERSION),
		messages: z.array(
			z.object({
				text: z.string(),
				firstSeen: z.number(),
				lastServed: z.number().optional(),
			}),
		),
		recent: z.array(z.string()).default([]),
	}),
]);

/** On-disk layout of the cache file. */
export interface CacheDocument {
	version: typeof CACHE_FORMAT_VERSION;
	messages: Array<{ text: string } & CachedMessageMeta>;
	recent: string[];
}

export interface MessageCacheOptions {
	/** Uniform random source in [0, 1) used when picking cached messages. */
	random?: () => number;
	/** Clock in epoch milliseconds. */
	now?: () => number;
}

export class MessageCache {
	readonly settings: CacheSettings;
	private entries: Map<string, CachedMessageMeta> = new Map();
	private recentList: string[] = [];
	private readonly writes = new SerialQueue();
	private readonly random: () => number;
	private readonly now: () => number;
	private readonly log = createLogger("cache");

	constructor(settings: CacheSettings, options?: MessageCacheOptions) {
		this.settings = settings;
		this.random = options?.random ?? Math.random;
		this.now = options?.now ?? Date.now;
	}

	/** Construct a cache and load its file. */
	static async open(settings: CacheSettings, options?: MessageCacheOptions): Promise<MessageCache> {
		const cache = new MessageCache(settings, options);
		await cache.load();
		return cache;
	}

	/**
	 * Replace the in-memory state with the file's contents.
	 * A missing file gives an empty cache; an unreadable one is logged and
	 * also gives an empty cache.
	 */
	async load(): Promise<void> {
		this.entries = new Map();
		this.recentList = [];

		let raw: unknown;
		try {
			raw = await readJsonFile(this.settings.file);
		} catch (error: unknown) {
			this.log.error(`Failed to read cache ${this.settings.file}: ${describeError(error)}`);
			return;
		}
		if (raw === undefined) {
			this.log.debug(`No cache file at ${this.settings.file}; starting empty`);
			return;
		}

		const parsed = CacheDocumentSchema.safeParse(raw);
		if (!parsed.success) {
			this.log.error(`Ignoring malformed cache ${this.settings.file}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
			return;
		}

		if (Array.isArray(parsed.data)) {
			const loadedAt = this.now();
			for (const text of parsed.data) {
				this.entries.set(text, { firstSeen: loadedAt });
			}
		} else {
			for (const { text, firstSeen, lastServed } of parsed.data.messages) {
				this.entries.set(text, lastServed === undefined ? { firstSeen } : { firstSeen, lastServed });
			}
			this.recentList = parsed.data.recent.filter((text) => this.entries.has(text));
		}

		this.evictOverflow();
		this.recentList = this.recentList.slice(-this.settings.lastLimit);
		this.log.info(`Loaded ${this.entries.size} cached messages`);
	}

	// ---------------------------------------------------------------------------
	// Reads
	// ---------------------------------------------------------------------------

	get size(): number {
		return this.entries.size;
	}

	/** Cached messages, oldest first. */
	messages(): string[] {
		return Array.from(this.entries.keys());
	}

	/** Recently served messages, oldest first. */
	recent(): string[] {
		return [...this.recentList];
	}

	has(text: string): boolean {
		return this.entries.has(text);
	}

	entry(text: string): CachedMessageMeta | undefined {
		const meta = this.entries.get(text);
		return meta ? { ...meta } : undefined;
	}

	/**
	 * Pick a random cached message that is not on the recent list and is not
	 * a fuzzy duplicate of anything in `existing`.
	 */
	pickCandidate(existing: readonly string[], threshold: number): string | undefined {
		const recent = new Set(this.recentList);
		const candidates = this.messages().filter((text) => !recent.has(text) && !isSimilar(text, existing, threshold));
		return this.choose(candidates);
	}

	// ---------------------------------------------------------------------------
	// Mutations
	// ---------------------------------------------------------------------------

	/**
	 * Accept a new message: insert it (evicting the oldest entries past
	 * `maxSize`), push it onto the recent list and persist.
	 *
	 * @returns false if the message was already cached (it is still pushed
	 *          onto the recent list).
	 */
	async add(text: string): Promise<boolean> {
		const fresh = !this.entries.has(text);
		const now = this.now();
		if (fresh) {
			this.entries.set(text, { firstSeen: now, lastServed: now });
			this.evictOverflow();
		} else {
			this.touch(text, now);
		}
		this.pushRecent(text);
		await this.save();
		return fresh;
	}

	/** Record that a cached message was served again. */
	async markServed(text: string): Promise<void> {
		if (!this.entries.has(text)) return;
		this.touch(text, this.now());
		this.pushRecent(text);
		await this.save();
	}

	/**
	 * Last-resort pick for the web layer once every provider has failed:
	 * a random cached message, preferring ones outside the recent list.
	 * The pick is marked as served.
	 */
	async archiveFallback(): Promise<string | undefined> {
		const recent = new Set(this.recentList);
		const all = this.messages();
		const stale = all.filter((text) => !recent.has(text));
		const pick = this.choose(stale.length > 0 ? stale : all);
		if (pick !== undefined) {
			await this.markServed(pick);
		}
		return pick;
	}

	async clear(): Promise<void> {
		this.entries.clear();
		this.recentList = [];
		await this.save();
	}

	/**
	 * Queue a write of the current state. Failures are logged, never thrown:
	 * the in-memory cache stays authoritative for this process.
	 */
	async save(): Promise<void> {
		const file = this.settings.file;
		try {
			await this.writes.run(() => writeJsonAtomic(file, this.toDocument()));
		} catch (error: unknown) {
			this.log.error(`Failed to write cache ${file}: ${describeError(error)}`);
		}
	}

	/** Wait for queued writes to finish. */
	async flush(): Promise<void> {
		await this.writes.run(async () => undefined);
	}

	toDocument(): CacheDocument {
		return {
			version: CACHE_FORMAT_VERSION,
			messages: Array.from(this.entries, ([text, meta]) => ({ text, ...meta })),
			recent: [...this.recentList],
		};
	}

	// ---------------------------------------------------------------------------
	// Internal
	// ---------------------------------------------------------------------------

	private touch(text: string, now: number): void {
		const meta = this.entries.get(text);
		if (meta) {
			this.entries.set(text, { ...meta, lastServed: now });
		}
	}

	private pushRecent(text: string): void {
		this.recentList = [...this.recentList.filter((t) => t !== text), text].slice(-this.settings.lastLimit);
	}

	private evictOverflow(): void {
		for (const text of this.entries.keys()) {
			if (this.entries.size <= this.settings.maxSize) break;
			this.entries.delete(text);
			this.recentList = this.recentList.filter((t) => t !== text);
			this.log.debug(`Evicted cached message: ${text.slice(0, 40)}`);
		}
	}

	private choose(items: readonly string[]): string | undefined {
		if (items.length === 0) return undefined;
		const index = Math.min(Math.floor(this.random() * items.length), items.length - 1);
		return items[index];
	}
}
