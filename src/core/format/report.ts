// Fixed-template rendering of a StatsRecord
// PURITY: CORE
// INVARIANT: Same StatsRecord → same Report; average rendered with one decimal
// COMPLEXITY: O(1)

import type { Report, StatsRecord } from "../models.js";

export const REPORT_TITLE = "=== 🔎 Analysis Report 🔍 ===";

/**
 * Render the statistics as `key: value` lines under the title line.
 *
 * @pure true
 * @postcondition result.text = result.lines.map(l => l + "\n").join("")
 * @complexity O(1)
 *
 * @example
 * ```ts
 * formatReport({ totalLines: 30, avgWordsPerLine: 8.1, uniqueWordCount: 166 }).lines;
 * // => ["=== 🔎 Analysis Report 🔍 ===", "total_lines: 30", "avg_length: 8.1", "unique_words: 166"]
 * ```
 */
export function formatReport(stats: StatsRecord): Report {
	const lines = [
		REPORT_TITLE,
		`total_lines: ${stats.totalLines}`,
		`avg_length: ${stats.avgWordsPerLine.toFixed(1)}`,
		`unique_words: ${stats.uniqueWordCount}`,
	] as const;
	return {
		lines,
		text: lines.map((line) => `${line}\n`).join(""),
	};
}
