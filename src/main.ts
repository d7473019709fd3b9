// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as a value; usage errors map to 2, broken defaults to 1
// COMPLEXITY: O(1) besides the delegated run

import { Effect, Either } from "effect";

import { runBanner } from "./app/runBanner.js";
import type { ExitCode } from "./core/models.js";
import { loadBannerConfig, parseCLIArgs } from "./shell/config/index.js";
import { printUsage, printUsageError } from "./shell/output/printer.js";

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @param args Command-line arguments, without the node and script entries
 * @param cwd Directory searched for `path-banner.config.json`
 * @param defaultsPath Replacement for the packaged `config/defaults.json`
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1,2}
 */
export function main(
	args: ReadonlyArray<string>,
	cwd: string = process.cwd(),
	defaultsPath?: string,
): Effect.Effect<ExitCode> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		return printUsageError(parsed.left.detail).pipe(Effect.as<ExitCode>(2));
	}
	const options = parsed.right;
	if (options.help) return printUsage().pipe(Effect.as<ExitCode>(0));
	return loadBannerConfig(cwd, defaultsPath).pipe(
		Effect.flatMap((config) => runBanner(options, config)),
		Effect.catchTag("Config", (error) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ Invalid configuration ${error.path}: ${error.detail}`);
				return 1;
			}),
		),
	);
}
