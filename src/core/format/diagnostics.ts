// User-facing wording for application errors
// PURITY: CORE
// INVARIANT: Every AppError variant maps to exactly one single-line message
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

/**
 * Render an error as the diagnostic line shown on stderr.
 *
 * @pure true
 * @invariant exhaustive over AppError["_tag"] × NotFound["reason"] × OutputTarget["destination"]
 * @complexity O(1)
 *
 * @example
 * ```ts
 * describeAppError(new NotFound({ path: "a.txt", reason: "missing", detail: "ENOENT" }));
 * // => "❌ Input file not found: a.txt"
 * ```
 */
export function describeAppError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "NotFound", reason: "missing" },
			(e) => `❌ Input file not found: ${e.path}`,
		)
		.with(
			{ _tag: "NotFound", reason: "unreadable" },
			(e) => `❌ Cannot read input file ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "IOError", target: { destination: "file" } },
			(e) => `❌ Cannot write report to ${e.target.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "IOError", target: { destination: "console" } },
			(e) => `❌ Cannot write report to console: ${e.detail}`,
		)
		.exhaustive();
}
