// Prints application errors to stderr
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: One stderr line per error; no stack traces
// COMPLEXITY: O(1)

import { Effect } from "effect";

import type { AppError } from "../../core/errors.js";
import { describeAppError } from "../../core/format/diagnostics.js";

/**
 * @pure false (stderr)
 * @effect Effect<void, never>
 */
export function reportDiagnostic(error: AppError): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(describeAppError(error));
	});
}
