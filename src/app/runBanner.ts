// PURITY: APP (no process.exit; composes CORE decisions with SHELL effects)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Files are processed one at a time, in the order given
// COMPLEXITY: O(Σ|file|) over all given files

import { Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import { isImpacted } from "../core/format/report.js";
import type { ExitCode } from "../core/models.js";
import type { BannerConfig, CLIOptions } from "../core/types/index.js";
import {
	printSummary,
	printUsage,
	reportOutcome,
} from "../shell/output/printer.js";
import { processFile } from "../shell/processor/processFile.js";

/**
 * Runs one check, fix or remove pass over the given files.
 *
 * @returns ExitCode 1 when at least one file needed attention or was
 * rewritten, 0 otherwise
 *
 * @pure false (filesystem and console)
 * @invariant an empty file list yields 0 without output
 */
export function runBanner(
	options: CLIOptions,
	config: BannerConfig,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		if (options.help) {
			yield* printUsage();
			return computeExitCode({ impactedFiles: 0 });
		}
		if (options.files.length === 0) {
			return computeExitCode({ impactedFiles: 0 });
		}

		const outcomes = yield* Effect.forEach(options.files, (filePath) =>
			processFile(filePath, options.mode, config).pipe(
				Effect.tap((outcome) => reportOutcome(outcome, options.verbose)),
			),
		);
		const impactedFiles = outcomes.filter(isImpacted).length;
		yield* printSummary(options.mode, impactedFiles);
		return computeExitCode({ impactedFiles });
	});
}
