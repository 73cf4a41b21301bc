// Composition of the pure pipeline stages
// FORMAT THEOREM: buildReport = formatReport ∘ analyzeDocument ∘ normalizeDocument
// PURITY: CORE
// INVARIANT: Stages run in fixed order, each exactly once
// COMPLEXITY: O(n) where n = total characters

import { pipe } from "effect";

import { formatReport } from "./format/report.js";
import type { RawDocument, Report, StatsRecord } from "./models.js";
import { analyzeDocument } from "./text/analyze.js";
import { type NormalizerOptions, normalizeDocument } from "./text/normalize.js";

/**
 * Normalizer → Analyzer.
 *
 * @pure true
 */
export const computeStats = (
	raw: RawDocument,
	options: NormalizerOptions = {},
): StatsRecord =>
	pipe(normalizeDocument(raw, options), analyzeDocument);

/**
 * Normalizer → Analyzer → report rendering.
 *
 * @pure true
 * @complexity O(n)
 */
export const buildReport = (
	raw: RawDocument,
	options: NormalizerOptions = {},
): Report => pipe(computeStats(raw, options), formatReport);
