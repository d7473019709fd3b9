// PURITY: SHELL
// EFFECT: Effect<A, FSError | DecodeError>
// INVARIANT: Synchronous calls only; one file is read, decided and written before the next
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { DecodeError, FSError } from "../../core/errors.js";
import { fs } from "../utils/node-mods.js";

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Size of the file in bytes.
 *
 * @effect Effect<number, FSError> — fails on missing files and permission errors
 */
export function statSize(filePath: string): Effect.Effect<number, FSError> {
	return Effect.try({
		try: () => fs.statSync(filePath).size,
		catch: (error) =>
			new FSError({ operation: "stat", path: filePath, detail: describe(error) }),
	});
}

/**
 * Reads the whole file as strict UTF-8. A leading byte-order mark is kept in
 * the returned text so callers can see it.
 *
 * @effect Effect<string, FSError | DecodeError>
 */
export function readUtf8(
	filePath: string,
): Effect.Effect<string, FSError | DecodeError> {
	return Effect.try({
		try: () => fs.readFileSync(filePath),
		catch: (error) =>
			new FSError({ operation: "read", path: filePath, detail: describe(error) }),
	}).pipe(
		Effect.flatMap((bytes) =>
			Effect.try({
				try: () =>
					new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(
						bytes,
					),
				catch: () => new DecodeError({ path: filePath }),
			}),
		),
	);
}

/**
 * Replaces the file content.
 *
 * @effect Effect<void, FSError>
 */
export function writeUtf8(
	filePath: string,
	content: string,
): Effect.Effect<void, FSError> {
	return Effect.try({
		try: () => {
			fs.writeFileSync(filePath, content, "utf8");
		},
		catch: (error) =>
			new FSError({ operation: "write", path: filePath, detail: describe(error) }),
	});
}
