// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports APP entry points, CORE functions and typed interfaces; SHELL internals stay private
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Programmatic run over a list of files.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { loadBannerConfig, runBanner } from "path-banner";
 *
 * const exitCode = Effect.runSync(
 *   loadBannerConfig(process.cwd()).pipe(
 *     Effect.flatMap((config) =>
 *       runBanner(
 *         { mode: "fix", files: ["src/app.ts"], help: false, verbose: false },
 *         config,
 *       ),
 *     ),
 *   ),
 * );
 * ```
 */
export { runBanner } from "./app/runBanner.js";
export { main } from "./main.js";
export { loadBannerConfig, parseCLIArgs } from "./shell/config/index.js";
export { processFile } from "./shell/processor/processFile.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode, HeaderStatus, RunMode } from "./core/models.js";
export type {
	BannerAction,
	BannerConfig,
	BannerPlan,
	CLIOptions,
	FileOutcome,
	InsertionPoint,
	SkipReason,
	StyleTable,
	UnsafeInsertionReason,
} from "./core/types/index.js";
export type { HeaderStrategy, StrategyKind } from "./core/strategies/index.js";
export {
	ConfigError,
	DecodeError,
	FSError,
	UsageError,
	type AppError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Decide what to do with a file's text, given its strategy.
 *
 * @pure true
 */
export { classifyHeader, planBanner } from "./core/banner/plan.js";
export { computeExitCode } from "./core/decision.js";
export {
	buildRecipeStrategy,
	declarationStrategy,
	fileTypeKey,
	frontmatterStrategy,
	normalizeBannerPath,
	renderHeader,
	scriptMetadataStrategy,
	selectStrategy,
	shebangStrategy,
	tagOpeningStrategy,
} from "./core/strategies/index.js";
