// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the banner process.
 *
 * @remarks
 * - @pure true
 * - @invariant 0 = nothing to do, 1 = files need or received changes, 2 = usage error
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Run mode selected on the command line.
 *
 * - `check`: report missing/incorrect banners, never write
 * - `fix`: add or update banners in place
 * - `remove`: strip banners in place
 */
export type RunMode = "check" | "fix" | "remove";

/**
 * Classification of the line found at the insertion point.
 *
 * @invariant correct ⇔ trimmed line equals trimmed expected banner
 */
export type HeaderStatus = "correct" | "incorrect" | "missing";

/**
 * Minimal decision state for producing the exit code of a run.
 *
 * @remarks
 * - @pure true
 * - @invariant impactedFiles ≥ 0
 */
export interface DecisionState {
	readonly impactedFiles: number;
}
