// PURITY: CORE
// INVARIANT: Formatting only; printing lives in the shell
// COMPLEXITY: O(1) per message

import { match } from "ts-pattern";

import type { RunMode } from "../models.js";
import type { FileOutcome } from "../types/index.js";

export const USAGE = [
	"usage: path-banner [-h] [--fix | --remove] [-v] [--] [files ...]",
	"",
	"Enforce a one-line path banner comment at the top of each file.",
	"",
	"positional arguments:",
	"  files          files to check",
	"",
	"options:",
	"  -h, --help     show this help message and exit",
	"  --fix          add or update banners in place",
	"  --remove       remove banners from files",
	"  -v, --verbose  report skipped files and why",
].join("\n");

/**
 * True when the outcome counts toward the summary and the exit code.
 */
export function isImpacted(outcome: FileOutcome): boolean {
	return outcome._tag === "NeedsAttention" || outcome._tag === "Written";
}

/**
 * Per-file notice for stdout, or null when the outcome is silent.
 *
 * @example
 * formatOutcome({ _tag: "Written", filePath: "a.py", action: "added" });
 * // => "Added header: a.py"
 */
export function formatOutcome(outcome: FileOutcome): string | null {
	return match(outcome)
		.with(
			{ _tag: "NeedsAttention", status: "missing" },
			(o) => `Missing header: ${o.filePath}`,
		)
		.with(
			{ _tag: "NeedsAttention", status: "incorrect" },
			(o) => `Incorrect header: ${o.filePath}`,
		)
		.with(
			{ _tag: "Written", action: "added" },
			(o) => `Added header: ${o.filePath}`,
		)
		.with(
			{ _tag: "Written", action: "updated" },
			(o) => `Updated header: ${o.filePath}`,
		)
		.with(
			{ _tag: "Written", action: "removed" },
			(o) => `Removed header: ${o.filePath}`,
		)
		.with({ _tag: "Skipped" }, { _tag: "Unchanged" }, () => null)
		.exhaustive();
}

/**
 * Skip notice for verbose runs, or null for any other outcome.
 */
export function formatSkip(outcome: FileOutcome): string | null {
	return outcome._tag === "Skipped"
		? `⚠️  Skipped ${outcome.filePath} (${outcome.reason})`
		: null;
}

/**
 * Closing summary line, or null when nothing was impacted.
 */
export function formatSummary(mode: RunMode, impacted: number): string | null {
	if (impacted === 0) return null;
	return match(mode)
		.with(
			"check",
			() =>
				`${impacted} files have missing/incorrect headers. Run with --fix.`,
		)
		.with("fix", () => `${impacted} files were updated with headers.`)
		.with("remove", () => `${impacted} files had headers removed.`)
		.exhaustive();
}
