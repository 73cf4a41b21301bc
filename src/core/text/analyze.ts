// Aggregate statistics over a normalized document
// FORMAT THEOREM: ∀D: uniqueWordCount(D) ≤ Σ_l |tokenize(l)| ∧ (|D| = 0 → avg(D) = 0)
// PURITY: CORE
// INVARIANT: No IO; full precision average, rounding left to rendering
// COMPLEXITY: O(n) where n = total characters

import type { CleanDocument, StatsRecord } from "../models.js";

const WHITESPACE = /\s+/;

/**
 * Split a line into words (maximal runs of non-whitespace).
 *
 * @pure true
 * @invariant ∀w ∈ result: w.length > 0
 * @complexity O(|line|)
 */
export function tokenizeLine(line: string): readonly string[] {
	return line.split(WHITESPACE).filter((word) => word.length > 0);
}

/**
 * Compute line count, mean words per line and distinct word count.
 *
 * @pure true
 * @postcondition clean.lines.length = 0 → result = { 0, 0, 0 }
 * @complexity O(n)
 *
 * @example
 * ```ts
 * analyzeDocument({ kind: "clean", lines: ["hello world", "hello world", ""] });
 * // => { totalLines: 3, avgWordsPerLine: 1.333…, uniqueWordCount: 2 }
 * ```
 */
export function analyzeDocument(clean: CleanDocument): StatsRecord {
	const totalLines = clean.lines.length;
	const distinct = new Set<string>();
	let totalWords = 0;

	for (const line of clean.lines) {
		const words = tokenizeLine(line);
		totalWords += words.length;
		for (const word of words) {
			distinct.add(word);
		}
	}

	// INVARIANT: totalLines = 0 is guarded, never divided by
	return {
		totalLines,
		avgWordsPerLine: totalLines === 0 ? 0 : totalWords / totalLines,
		uniqueWordCount: distinct.size,
	};
}
