// PURITY: SHELL
// EFFECT: Effect<void>
// INVARIANT: Notices go to stdout; skip diagnostics and usage errors go to stderr
// COMPLEXITY: O(1) per call

import { Effect } from "effect";

import {
	formatOutcome,
	formatSkip,
	formatSummary,
	USAGE,
} from "../../core/format/report.js";
import type { RunMode } from "../../core/models.js";
import type { FileOutcome } from "../../core/types/index.js";

/**
 * Prints the per-file notice, and in verbose runs the skip reason.
 */
export function reportOutcome(
	outcome: FileOutcome,
	verbose: boolean,
): Effect.Effect<void> {
	return Effect.sync(() => {
		const notice = formatOutcome(outcome);
		if (notice !== null) console.log(notice);
		if (!verbose) return;
		const skip = formatSkip(outcome);
		if (skip !== null) console.warn(skip);
	});
}

/**
 * Prints the closing summary, preceded by a blank line. Silent when nothing
 * was impacted.
 */
export function printSummary(
	mode: RunMode,
	impacted: number,
): Effect.Effect<void> {
	return Effect.sync(() => {
		const summary = formatSummary(mode, impacted);
		if (summary !== null) console.log(`\n${summary}`);
	});
}

export function printUsage(): Effect.Effect<void> {
	return Effect.sync(() => {
		console.log(USAGE);
	});
}

/**
 * Usage line plus the parser's complaint, in the usual CLI shape.
 */
export function printUsageError(detail: string): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(USAGE.split("\n")[0] ?? "");
		console.error(`path-banner: error: ${detail}`);
	});
}
