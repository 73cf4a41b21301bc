// Single import point for configuration and domain types

export type { RunConfig } from "./config.js";
export { DEFAULT_RUN_CONFIG } from "./config.js";
export type {
	CleanDocument,
	DecisionState,
	ExitCode,
	RawDocument,
	Report,
	StatsRecord,
} from "../models.js";
