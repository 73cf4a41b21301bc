// Typed domain error ADT for the Functional Core using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Input file missing or unreadable.
 *
 * @pure true (Data class)
 * @invariant path.length > 0 ∧ detail.length > 0
 * @complexity O(1)
 */
export class NotFound extends Data.TaggedError("NotFound")<{
	readonly path: string;
	readonly reason: "missing" | "unreadable";
	readonly detail: string;
}> {}

/**
 * Where a report delivery was headed. Only the file destination has a path.
 */
export type OutputTarget =
	| { readonly destination: "file"; readonly path: string }
	| { readonly destination: "console" };

/**
 * Report could not be written to one of its destinations.
 *
 * @pure true (Data class)
 * @invariant target.destination = "file" → target.path is defined (by type)
 * @complexity O(1)
 */
export class IOError extends Data.TaggedError("IOError")<{
	readonly target: OutputTarget;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = NotFound | IOError;

/**
 * Extract a printable message from whatever a failed I/O call rejected with.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeCause(cause: unknown): string {
	if (cause instanceof Error) {
		return cause.message;
	}
	return String(cause);
}
