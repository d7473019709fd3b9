// FORMAT THEOREM: ∀path: processFile(path) never fails; storage is touched only for Write plans
// PURITY: SHELL
// EFFECT: Effect<FileOutcome, never>
// INVARIANT: A file the tool is unsure about is left byte-for-byte untouched
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";
import { match } from "ts-pattern";

import { planBanner } from "../../core/banner/plan.js";
import type { RunMode } from "../../core/models.js";
import {
	isAlwaysSkipped,
	selectStrategy,
} from "../../core/strategies/index.js";
import type {
	BannerConfig,
	BannerPlan,
	FileOutcome,
	SkipReason,
} from "../../core/types/index.js";
import { readUtf8, statSize, writeUtf8 } from "../fs/files.js";

const skipped = (filePath: string, reason: SkipReason): FileOutcome => ({
	_tag: "Skipped",
	filePath,
	reason,
});

function applyPlan(
	filePath: string,
	plan: BannerPlan,
): Effect.Effect<FileOutcome> {
	return match(plan)
		.with({ _tag: "Skip" }, (p) => Effect.succeed(skipped(filePath, p.reason)))
		.with({ _tag: "Keep" }, (p) =>
			Effect.succeed<FileOutcome>({
				_tag: "Unchanged",
				filePath,
				status: p.status,
			}),
		)
		.with({ _tag: "Report" }, (p) =>
			Effect.succeed<FileOutcome>({
				_tag: "NeedsAttention",
				filePath,
				status: p.status,
			}),
		)
		.with({ _tag: "Write" }, (p) =>
			writeUtf8(filePath, p.content).pipe(
				Effect.map(
					(): FileOutcome => ({ _tag: "Written", filePath, action: p.action }),
				),
				Effect.catchTag("FS", () =>
					Effect.succeed(skipped(filePath, "write-failed")),
				),
			),
		)
		.exhaustive();
}

/**
 * Processes one file: exclusion, size guard, strategy lookup, read, plan and
 * (in fix/remove mode) write-back.
 *
 * @param filePath - Path as given; it is also the path written into the banner
 * @param mode - check, fix or remove
 * @param config - Run-wide configuration
 * @returns Effect that always succeeds with the file's outcome
 *
 * @pure false (filesystem I/O)
 * @effect Effect<FileOutcome, never>
 * @postcondition outcome ∈ {Skipped, Unchanged} → file content unchanged
 */
export function processFile(
	filePath: string,
	mode: RunMode,
	config: BannerConfig,
): Effect.Effect<FileOutcome> {
	if (isAlwaysSkipped(filePath, config.alwaysSkip)) {
		return Effect.succeed(skipped(filePath, "excluded"));
	}

	return Effect.gen(function* () {
		const size = yield* statSize(filePath);
		if (size > config.maxFileSizeBytes) {
			return skipped(filePath, "too-large");
		}

		const strategy = selectStrategy(filePath, config.styles);
		if (strategy === undefined) {
			return skipped(filePath, "unsupported");
		}

		const text = yield* readUtf8(filePath);
		const plan = planBanner({ filePath, text, strategy, mode });
		return yield* applyPlan(filePath, plan);
	}).pipe(
		Effect.catchTags({
			FS: () => Effect.succeed(skipped(filePath, "unreadable")),
			Decode: () => Effect.succeed(skipped(filePath, "not-utf8")),
		}),
	);
}
