// Functional Core domain models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the pipeline process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Lines exactly as read from storage, newline characters stripped.
 *
 * @remarks
 * - @invariant lines are in file order
 */
export interface RawDocument {
	readonly kind: "raw";
	readonly path: string;
	readonly lines: readonly string[];
}

/**
 * Lines after normalization: lowercase, punctuation-free, trimmed.
 *
 * @remarks
 * - @invariant lines.length equals the length of the RawDocument it came from
 */
export interface CleanDocument {
	readonly kind: "clean";
	readonly lines: readonly string[];
}

/**
 * Descriptive statistics for one document. Values keep full precision;
 * rounding belongs to report rendering.
 *
 * @remarks
 * - @invariant totalLines = 0 → avgWordsPerLine = 0
 * - @invariant uniqueWordCount ≤ totalLines × avgWordsPerLine
 */
export interface StatsRecord {
	readonly totalLines: number;
	readonly avgWordsPerLine: number;
	readonly uniqueWordCount: number;
}

/**
 * Rendered report. `text` is what lands in the output file; printing `lines`
 * one per console line reproduces it exactly.
 */
export interface Report {
	readonly lines: readonly string[];
	readonly text: string;
}

/**
 * Minimal decision state for producing exit code from a run.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly inputFailed: boolean;
	readonly deliveryFailures: number;
}
