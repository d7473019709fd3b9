import type { HeaderStatus } from "../models.js";

/**
 * Reasons a strategy refuses to pick an insertion line.
 *
 * Each one marks a file whose preamble cannot be skipped with certainty, so
 * writing a banner could corrupt it or surface as visible text.
 */
export type UnsafeInsertionReason =
	| "unterminated-declaration"
	| "unterminated-charset"
	| "xml-declaration"
	| "single-line-script"
	| "no-script-tag"
	| "unclosed-frontmatter";

/**
 * Where a banner belongs in a file snapshot.
 *
 * @invariant InsertAt.index ≥ 0
 */
export type InsertionPoint =
	| { readonly _tag: "InsertAt"; readonly index: number }
	| { readonly _tag: "Skip"; readonly reason: UnsafeInsertionReason };

/**
 * Every reason a file ends up untouched without being reported.
 */
export type SkipReason =
	| "excluded"
	| "too-large"
	| "unreadable"
	| "unsupported"
	| "not-utf8"
	| "byte-order-mark"
	| "empty"
	| "write-failed"
	| UnsafeInsertionReason;

export type BannerAction = "added" | "updated" | "removed";

export type ProblemStatus = Exclude<HeaderStatus, "correct">;

/**
 * Pure decision for one file, computed from its text.
 *
 * - `Skip`: never touch the file
 * - `Keep`: nothing to do in this mode
 * - `Report`: check mode found a problem
 * - `Write`: new full content to flush back to storage
 */
export type BannerPlan =
	| { readonly _tag: "Skip"; readonly reason: SkipReason }
	| { readonly _tag: "Keep"; readonly status: HeaderStatus }
	| { readonly _tag: "Report"; readonly status: ProblemStatus }
	| {
			readonly _tag: "Write";
			readonly action: BannerAction;
			readonly content: string;
	  };

/**
 * Result of processing one path.
 *
 * @invariant changed(outcome) ⇔ _tag ∈ {NeedsAttention, Written}
 */
export type FileOutcome =
	| {
			readonly _tag: "Skipped";
			readonly filePath: string;
			readonly reason: SkipReason;
	  }
	| {
			readonly _tag: "Unchanged";
			readonly filePath: string;
			readonly status: HeaderStatus;
	  }
	| {
			readonly _tag: "NeedsAttention";
			readonly filePath: string;
			readonly status: ProblemStatus;
	  }
	| {
			readonly _tag: "Written";
			readonly filePath: string;
			readonly action: BannerAction;
	  };
