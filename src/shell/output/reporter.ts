// Delivers a rendered Report to the console and to the output file
// FORMAT THEOREM: deliver(r, p) attempts console(r) and file(r, p) independently
// PURITY: SHELL
// EFFECT: Effect<readonly IOError[], never>
// INVARIANT: Output file holds exactly Report.text after a successful write (overwrite, no append)
// COMPLEXITY: O(|report|)

import { Effect, Either } from "effect";

import { describeCause, IOError } from "../../core/errors.js";
import type { Report } from "../../core/models.js";
import { fsPromises } from "../utils/node-mods.js";

/**
 * Print the report, one console line per report line.
 *
 * @pure false (stdout)
 * @effect Effect<void, IOError>
 */
export function printReport(report: Report): Effect.Effect<void, IOError> {
	return Effect.try({
		try: () => {
			// INVARIANT: one console.log per line reproduces report.text byte for byte
			for (const line of report.lines) {
				console.log(line);
			}
		},
		catch: (cause) =>
			new IOError({
				target: { destination: "console" },
				detail: describeCause(cause),
			}),
	});
}

/**
 * Write the report to `outputPath`, replacing any previous content.
 *
 * @pure false (file system write)
 * @effect Effect<void, IOError>
 */
export function writeReportFile(
	report: Report,
	outputPath: string,
): Effect.Effect<void, IOError> {
	return Effect.tryPromise({
		// INVARIANT: writeFile truncates; no append across runs
		try: () => fsPromises.writeFile(outputPath, report.text, "utf8"),
		catch: (cause) =>
			new IOError({
				target: { destination: "file", path: outputPath },
				detail: describeCause(cause),
			}),
	});
}

/**
 * Attempt both destinations; a failure on one never skips the other.
 *
 * @returns Effect that succeeds with every delivery failure, console first (empty on success)
 *
 * @pure false
 * @effect Effect<readonly IOError[], never>
 * @postcondition result.length ≤ 2
 */
export function deliverReport(
	report: Report,
	outputPath: string,
): Effect.Effect<readonly IOError[]> {
	// INVARIANT: mode "either" turns each failure into a value, so both effects always run
	// COMPLEXITY: sequential, console first; failures keep that order
	return Effect.all([printReport(report), writeReportFile(report, outputPath)], {
		mode: "either",
	}).pipe(
		Effect.map((results) =>
			results.flatMap((result) => (Either.isLeft(result) ? [result.left] : [])),
		),
	);
}
