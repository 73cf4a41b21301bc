// Loads the input text file into a RawDocument
// PURITY: SHELL
// EFFECT: Effect<RawDocument, NotFound>
// INVARIANT: Source file is only read, never modified; failures are typed values
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { describeCause, NotFound } from "../../core/errors.js";
import type { RawDocument } from "../../core/models.js";
import { fsPromises } from "../utils/node-mods.js";

const UNIVERSAL_NEWLINE = /\r\n|\r|\n/;

/**
 * Split file content into lines on `\r\n`, `\r` or `\n`.
 * A terminating newline closes the last line instead of opening an empty one.
 *
 * @pure true
 * @invariant splitLines("") = []
 * @complexity O(n)
 *
 * @example
 * ```ts
 * splitLines("a\r\nb\n\n"); // => ["a", "b", ""]
 * ```
 */
export function splitLines(content: string): readonly string[] {
	if (content.length === 0) return [];
	const lines = content.split(UNIVERSAL_NEWLINE);
	// INVARIANT: split yields a trailing "" exactly when content ends with a newline
	const last = lines.at(-1);
	return last === "" ? lines.slice(0, -1) : lines;
}

// ENOTDIR: a path component is a regular file, so the target cannot exist
function isMissingPath(cause: unknown): boolean {
	return (
		cause instanceof Error &&
		"code" in cause &&
		(cause.code === "ENOENT" || cause.code === "ENOTDIR")
	);
}

/**
 * Read a UTF-8 text file as an ordered sequence of lines.
 *
 * @param filePath - Path to the input file
 * @returns Effect that fails with NotFound when the file is missing or unreadable
 *
 * @pure false (file system read)
 * @effect Effect<RawDocument, NotFound>
 */
export function loadDocument(
	filePath: string,
): Effect.Effect<RawDocument, NotFound> {
	return Effect.tryPromise({
		try: () => fsPromises.readFile(filePath, "utf8"),
		catch: (cause) =>
			new NotFound({
				path: filePath,
				reason: isMissingPath(cause) ? "missing" : "unreadable",
				detail: describeCause(cause),
			}),
	}).pipe(
		Effect.map(
			(content): RawDocument => ({
				kind: "raw",
				path: filePath,
				lines: splitLines(content),
			}),
		),
	);
}
