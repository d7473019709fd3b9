import type { RunMode } from "../models.js";

/**
 * Mapping from file-type key (`.py`, `.dockerfile`, `.bashrc`) to a comment
 * template holding at most one `{}` placeholder for the file path.
 *
 * @invariant immutable for the duration of a run
 * @invariant an empty template marks a type as unsupported
 */
export type StyleTable = ReadonlyMap<string, string>;

/**
 * Run-wide configuration, built once at start-up.
 *
 * @property styles Comment templates per file-type key
 * @property alwaysSkip Base names never touched, regardless of extension
 * @property maxFileSizeBytes Files strictly larger than this are skipped
 */
export interface BannerConfig {
	readonly styles: StyleTable;
	readonly alwaysSkip: ReadonlySet<string>;
	readonly maxFileSizeBytes: number;
}

/**
 * Parsed command line.
 *
 * @property mode check (default), fix or remove
 * @property files Paths to process, in the order given
 * @property help Usage text requested
 * @property verbose Report skipped files and their reasons
 */
export interface CLIOptions {
	readonly mode: RunMode;
	readonly files: ReadonlyArray<string>;
	readonly help: boolean;
	readonly verbose: boolean;
}
