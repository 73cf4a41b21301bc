// Run configuration: the only knobs are the two file paths
// PURITY: CORE
// INVARIANT: Defaults are explicit values passed into the run, never ambient state

/**
 * Options for a single pipeline run.
 *
 * @property inputPath Text file to analyze
 * @property outputPath File the report is written to (overwritten)
 */
export interface RunConfig {
	readonly inputPath: string;
	readonly outputPath: string;
}

/**
 * Paths used when the command line does not override them.
 */
export const DEFAULT_RUN_CONFIG: RunConfig = {
	inputPath: "sample_data.txt",
	outputPath: "report.txt",
};
