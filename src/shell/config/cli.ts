// Command-line parsing into a RunConfig
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Unknown flags and empty arguments never change the result
// COMPLEXITY: O(n) where n = |args|

import { DEFAULT_RUN_CONFIG, type RunConfig } from "../../core/types/index.js";

interface ArgProcessResult extends RunConfig {
	readonly positionals: number;
	readonly skipNext: boolean;
}

type ArgState = Omit<ArgProcessResult, "skipNext">;

type ValueFlagHandler = (
	args: readonly string[],
	index: number,
	current: ArgState,
) => ArgProcessResult | null;

function createValueFlagHandler(key: keyof RunConfig): ValueFlagHandler {
	return (args, index, current) => {
		const value = args[index + 1];
		if (value === undefined || value.length === 0 || value.startsWith("--")) {
			return null;
		}
		return { ...current, [key]: value, skipNext: true };
	};
}

// INVARIANT: Map lookup only; argument text never reaches Object.prototype keys
const valueHandlers: ReadonlyMap<string, ValueFlagHandler> = new Map([
	["--input", createValueFlagHandler("inputPath")],
	["--output", createValueFlagHandler("outputPath")],
]);

// Positionals fill inputPath, then outputPath; extras are ignored
const POSITIONAL_KEYS: readonly (keyof RunConfig)[] = ["inputPath", "outputPath"];

function processArgument(
	arg: string,
	args: readonly string[],
	index: number,
	current: ArgState,
): ArgProcessResult {
	const handler = valueHandlers.get(arg);
	if (handler !== undefined) {
		// A flag missing its value is dropped, never read as a positional
		const result = handler(args, index, current);
		if (result !== null) return result;
		return { ...current, skipNext: false };
	}

	if (!arg.startsWith("--")) {
		// INVARIANT: positionals ≤ |POSITIONAL_KEYS| consumed in order
		const key = POSITIONAL_KEYS[current.positionals];
		const next = { ...current, positionals: current.positionals + 1 };
		return key === undefined
			? { ...next, skipNext: false }
			: { ...next, [key]: arg, skipNext: false };
	}

	return { ...current, skipNext: false };
}

/**
 * Parse command-line arguments over the default paths.
 *
 * @param args - Arguments after the node binary and script (defaults to process.argv)
 * @returns Paths for this run
 *
 * @example
 * ```ts
 * // Command: text-stats notes.txt --output out/report.txt
 * const config = parseCLIArgs();
 * // Returns: { inputPath: "notes.txt", outputPath: "out/report.txt" }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): RunConfig {
	let state: ArgState = { ...DEFAULT_RUN_CONFIG, positionals: 0 };

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args, i, state);
		state = result;
		if (result.skipNext) {
			i++;
		}
	}

	return { inputPath: state.inputPath, outputPath: state.outputPath };
}
