// Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports APP orchestration, CORE stages and typed errors; SHELL internals stay hidden

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the whole pipeline and get an exit code back.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runPipeline } from "text-stats";
 *
 * const exitCode = await Effect.runPromise(
 *   runPipeline({ inputPath: "notes.txt", outputPath: "report.txt" }),
 * );
 * ```
 */
export { analyzeFile, runPipeline } from "./app/runPipeline.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE STAGES (pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export { describeAppError } from "./core/format/diagnostics.js";
export { formatReport, REPORT_TITLE } from "./core/format/report.js";
export { buildReport, computeStats } from "./core/pipeline.js";
export { analyzeDocument, tokenizeLine } from "./core/text/analyze.js";
export {
	DEFAULT_PUNCTUATION,
	type NormalizerOptions,
	normalizeDocument,
	normalizeLine,
} from "./core/text/normalize.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	IOError,
	NotFound,
	type OutputTarget,
} from "./core/errors.js";
export {
	type CleanDocument,
	DEFAULT_RUN_CONFIG,
	type ExitCode,
	type RawDocument,
	type Report,
	type RunConfig,
	type StatsRecord,
} from "./core/types/index.js";
