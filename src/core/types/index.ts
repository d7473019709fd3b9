export type {
	BannerAction,
	BannerPlan,
	FileOutcome,
	InsertionPoint,
	ProblemStatus,
	SkipReason,
	UnsafeInsertionReason,
} from "./banner.js";
export type { BannerConfig, CLIOptions, StyleTable } from "./config.js";
