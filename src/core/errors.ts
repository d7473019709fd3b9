// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Filesystem operation error.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly operation: "stat" | "read" | "write";
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * File content is not valid UTF-8 (binary or foreign encoding).
 *
 * @pure true (Data class)
 */
export class DecodeError extends Data.TaggedError("Decode")<{
	readonly path: string;
}> {}

/**
 * Configuration file could not be parsed or has an invalid shape.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("Config")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Invalid command line.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("Usage")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures.
 */
export type AppError = FSError | DecodeError | ConfigError | UsageError;
