// Pure decision function mapping a run's outcome to an exit code
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (s.inputFailed ∨ s.deliveryFailures > 0) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

const toExitCode = (failed: boolean): ExitCode => (failed ? 1 : 0);

/**
 * Computes process exit code from the run state (pure function).
 *
 * @param state - Immutable flags collected while running the pipeline
 * @returns 1 if the input could not be loaded or any report delivery failed; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ inputFailed: false, deliveryFailures: 1 }); // => 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.inputFailed || s.deliveryFailures > 0,
		toExitCode,
	);
