// Line normalization: lowercase, punctuation removal, whitespace cleanup
// FORMAT THEOREM: ∀R: |normalizeDocument(R).lines| = |R.lines| ∧ normalize ∘ normalize = normalize
// PURITY: CORE
// INVARIANT: Each line is transformed independently; empty lines stay empty
// COMPLEXITY: O(n) where n = total characters

import type { CleanDocument, RawDocument } from "../models.js";

/**
 * Anything that is neither a Unicode letter, a Unicode number, nor whitespace.
 */
export const DEFAULT_PUNCTUATION = /[^\p{L}\p{N}\s]/gu;

const WHITESPACE_RUN = /\s+/g;

export interface NormalizerOptions {
	/** Characters to delete from each line. Must carry the `g` flag. */
	readonly punctuation?: RegExp;
}

/**
 * Normalize a single line.
 *
 * @pure true
 * @invariant normalizeLine(normalizeLine(l)) = normalizeLine(l)
 * @complexity O(|line|)
 *
 * @example
 * ```ts
 * normalizeLine("  Hello,   World! ") // => "hello world"
 * ```
 */
export function normalizeLine(
	line: string,
	options: NormalizerOptions = {},
): string {
	const punctuation = options.punctuation ?? DEFAULT_PUNCTUATION;
	return line
		.toLowerCase()
		.replace(punctuation, "")
		.replace(WHITESPACE_RUN, " ")
		.trim();
}

/**
 * Normalize every line of a raw document, preserving order and count.
 *
 * @pure true
 * @postcondition result.lines.length = raw.lines.length
 * @complexity O(n)
 */
export function normalizeDocument(
	raw: RawDocument,
	options: NormalizerOptions = {},
): CleanDocument {
	return {
		kind: "clean",
		lines: raw.lines.map((line) => normalizeLine(line, options)),
	};
}
