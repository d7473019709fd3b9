// FORMAT THEOREM: ∀s ∈ State: s.impactedFiles > 0 ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the number of impacted files (pure function).
 *
 * A non-zero code in fix/remove mode tells an automated caller (a commit hook)
 * that the working tree was modified; in check mode it means files need action.
 *
 * @param state - Immutable counters of the finished run
 * @returns 1 if any file needed or received a change; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ impactedFiles: 3 }); // => 1
 * computeExitCode({ impactedFiles: 0 }); // => 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.impactedFiles > 0,
		(impacted): ExitCode => (impacted ? 1 : 0),
	);
