// Application layer: composes the pure CORE stages with SHELL I/O
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; on NotFound nothing is rendered or written
// COMPLEXITY: O(n) where n = input size

import { Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import type { NotFound } from "../core/errors.js";
import type { ExitCode, StatsRecord } from "../core/models.js";
import { buildReport, computeStats } from "../core/pipeline.js";
import type { NormalizerOptions } from "../core/text/normalize.js";
import type { RunConfig } from "../core/types/index.js";
import { loadDocument } from "../shell/io/loader.js";
import { deliverReport, reportDiagnostic } from "../shell/output/index.js";

/**
 * Loader → Normalizer → Analyzer, for programmatic use.
 *
 * @param inputPath - Text file to analyze
 * @returns Effect with the statistics, failing with NotFound when the file cannot be read
 *
 * @pure false (file system read)
 * @effect Effect<StatsRecord, NotFound>
 */
export function analyzeFile(
	inputPath: string,
	options: NormalizerOptions = {},
): Effect.Effect<StatsRecord, NotFound> {
	return loadDocument(inputPath).pipe(
		Effect.map((raw) => computeStats(raw, options)),
	);
}

/**
 * Runs the full pipeline and returns ExitCode as value (no process.exit).
 *
 * @param config - Input and output paths for this run
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ExitCode, never> - errors are printed and folded into the exit code
 * @invariant ExitCode ∈ {0,1}
 * @postcondition input missing ∨ any delivery failed → 1 else 0
 */
export function runPipeline(config: RunConfig): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		// INVARIANT: NotFound short-circuits here; nothing below runs, no file is touched
		const raw = yield* loadDocument(config.inputPath);
		const report = buildReport(raw);

		// Each IOError gets its own stderr line; none aborts the other delivery
		const failures = yield* deliverReport(report, config.outputPath);
		for (const failure of failures) {
			yield* reportDiagnostic(failure);
		}

		return computeExitCode({
			inputFailed: false,
			deliveryFailures: failures.length,
		});
	}).pipe(
		Effect.catchTag("NotFound", (error) =>
			reportDiagnostic(error).pipe(
				Effect.map(() =>
					computeExitCode({ inputFailed: true, deliveryFailures: 0 }),
				),
			),
		),
	);
}
