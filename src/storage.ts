/**
 * snippet-ticker — JSON file helpers shared by the message cache and the
 * plugin settings file.
 * @module
 */

import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";

/**
 * Read and parse a JSON file.
 * Resolves `undefined` when the file does not exist; any other read or
 * parse failure rejects.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf-8");
	} catch (error: unknown) {
		if (isNotFound(error)) return undefined;
		throw error;
	}
	return JSON.parse(raw);
}

/**
 * Write `data` as JSON by writing a sibling temp file and renaming it over
 * the target, so a crash mid-write never leaves a truncated file behind.
 * Creates the parent directory if needed.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
	await mkdir(dirname(filePath), { recursive: true });
	const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
	try {
		await writeFile(tempPath, JSON.stringify(data, null, "\t"), "utf-8");
		await rename(tempPath, filePath);
	} catch (error: unknown) {
		await rm(tempPath, { force: true });
		throw error;
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Runs async tasks one at a time, in submission order.
 *
 * A failed task rejects its own promise only; the queue keeps going.
 */
export class SerialQueue {
	private tail: Promise<unknown> = Promise.resolve();

	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.catch(() => undefined);
		return result;
	}
}
