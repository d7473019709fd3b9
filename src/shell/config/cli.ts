// PURITY: SHELL boundary, but the parser itself is a pure function of argv
// INVARIANT: --help wins over every other flag, including conflicting ones
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { RunMode } from "../../core/models.js";
import type { CLIOptions } from "../../core/types/index.js";

interface ParseState {
	readonly modes: ReadonlyArray<Exclude<RunMode, "check">>;
	readonly files: ReadonlyArray<string>;
	readonly help: boolean;
	readonly verbose: boolean;
	readonly unknown: ReadonlyArray<string>;
	readonly optionsEnded: boolean;
}

type FlagHandler = (state: ParseState) => ParseState;

const flagHandlers: ReadonlyMap<string, FlagHandler> = new Map<
	string,
	FlagHandler
>([
	["--fix", (s) => ({ ...s, modes: [...s.modes, "fix"] })],
	["--remove", (s) => ({ ...s, modes: [...s.modes, "remove"] })],
	["-h", (s) => ({ ...s, help: true })],
	["--help", (s) => ({ ...s, help: true })],
	["-v", (s) => ({ ...s, verbose: true })],
	["--verbose", (s) => ({ ...s, verbose: true })],
	["--", (s) => ({ ...s, optionsEnded: true })],
]);

function isOption(arg: string): boolean {
	return arg.startsWith("-") && arg !== "-";
}

function processArgument(state: ParseState, arg: string): ParseState {
	if (state.optionsEnded || !isOption(arg)) {
		return { ...state, files: [...state.files, arg] };
	}
	const handler = flagHandlers.get(arg);
	return handler === undefined
		? { ...state, unknown: [...state.unknown, arg] }
		: handler(state);
}

function resolveMode(
	modes: ParseState["modes"],
): Either.Either<RunMode, UsageError> {
	const distinct = new Set(modes);
	if (distinct.size > 1) {
		return Either.left(
			new UsageError({
				detail: "argument --remove: not allowed with argument --fix",
			}),
		);
	}
	const [only] = distinct;
	return Either.right(only ?? "check");
}

/**
 * Parses the command line (without the node and script entries).
 *
 * @returns Right(options) or Left(UsageError) for unknown flags and for
 * --fix combined with --remove
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseCLIArgs(["--fix", "src/a.ts"]);
 * // => Right({ mode: "fix", files: ["src/a.ts"], help: false, verbose: false })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string>,
): Either.Either<CLIOptions, UsageError> {
	const initial: ParseState = {
		modes: [],
		files: [],
		help: false,
		verbose: false,
		unknown: [],
		optionsEnded: false,
	};
	const state = args.reduce(processArgument, initial);

	if (state.help) {
		return Either.right<CLIOptions>({
			mode: "check",
			files: state.files,
			help: true,
			verbose: state.verbose,
		});
	}
	if (state.unknown.length > 0) {
		return Either.left(
			new UsageError({
				detail: `unrecognized arguments: ${state.unknown.join(" ")}`,
			}),
		);
	}
	return Either.map(
		resolveMode(state.modes),
		(mode): CLIOptions => ({
			mode,
			files: state.files,
			help: false,
			verbose: state.verbose,
		}),
	);
}
