#!/usr/bin/env node

// Thin CLI shell wrapper - single point of process.exit
// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runPipeline } from "../app/runPipeline.js";
import { parseCLIArgs } from "../shell/config/index.js";

/**
 * CLI entry point for text-stats.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 when the report reached both destinations, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const config = parseCLIArgs();
		const code = await Effect.runPromise(runPipeline(config));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
