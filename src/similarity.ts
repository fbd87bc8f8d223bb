/**
 * snippet-ticker — Fuzzy duplicate detection.
 *
 * `ratio` is the normalized Indel similarity: `2 * LCS / (len(a) + len(b))`
 * on a 0–100 scale, computed over Unicode code points. It is symmetric,
 * two empty strings score 100, and an empty string against a non-empty one
 * scores 0.
 * @module
 */

function longestCommonSubsequence(a: readonly string[], b: readonly string[]): number {
	// Keep the shorter sequence in the inner dimension.
	const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
	let previous = new Array<number>(inner.length + 1).fill(0);
	let current = new Array<number>(inner.length + 1).fill(0);

	for (const ch of outer) {
		for (let j = 1; j <= inner.length; j++) {
			current[j] = inner[j - 1] === ch ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
		}
		[previous, current] = [current, previous];
	}
	return previous[inner.length];
}

/** Similarity of `a` and `b` in [0, 100]. */
export function ratio(a: string, b: string): number {
	const left = Array.from(a);
	const right = Array.from(b);
	const total = left.length + right.length;
	if (total === 0) return 100;
	if (a === b) return 100;
	return (200 * longestCommonSubsequence(left, right)) / total;
}

/**
 * First entry of `others` scoring at least `threshold` against `candidate`,
 * or `undefined` when none does.
 */
export function findSimilar(candidate: string, others: Iterable<string>, threshold: number): string | undefined {
	for (const other of others) {
		if (ratio(candidate, other) >= threshold) {
			return other;
		}
	}
	return undefined;
}

/** Whether `candidate` is a fuzzy duplicate of anything in `others`. */
export function isSimilar(candidate: string, others: Iterable<string>, threshold: number): boolean {
	return findSimilar(candidate, others, threshold) !== undefined;
}
