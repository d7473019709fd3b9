// PURITY: CORE
// INVARIANT: A strategy owns no file content; every call receives fresh lines
// COMPLEXITY: O(|template| + |path|) per banner operation

import type { InsertionPoint, UnsafeInsertionReason } from "../types/index.js";

export const PATH_PLACEHOLDER = "{}";
export const SHEBANG_MARKER = "#!";

/**
 * Family a strategy belongs to. Families differ only in how they locate the
 * first line after the "must come first" preamble of a file.
 */
export type StrategyKind =
	| "shebang"
	| "script-metadata"
	| "build-recipe"
	| "declaration"
	| "tag-opening"
	| "frontmatter";

/**
 * Per-file-type banner policy.
 *
 * @invariant stateless apart from `template`
 */
export interface HeaderStrategy {
	readonly kind: StrategyKind;
	readonly template: string;
	/** Banner line for `filePath`, terminated by `\n`. */
	readonly expectedHeader: (filePath: string) => string;
	/** True when `line` has this style's banner shape, whatever path it names. */
	readonly isHeaderLine: (line: string) => boolean;
	readonly insertionPoint: (lines: ReadonlyArray<string>) => InsertionPoint;
}

export type InsertionRule = (lines: ReadonlyArray<string>) => InsertionPoint;

export const insertAt = (index: number): InsertionPoint => ({
	_tag: "InsertAt",
	index,
});

export const skipFile = (reason: UnsafeInsertionReason): InsertionPoint => ({
	_tag: "Skip",
	reason,
});

/**
 * Forward slashes only, no leading `./` segments.
 *
 * @example
 * normalizeBannerPath(".\\src\\app.ts"); // => "src/app.ts"
 */
export function normalizeBannerPath(filePath: string): string {
	return filePath.replace(/\\/g, "/").replace(/^(?:\.\/)+/u, "");
}

function splitTemplate(template: string): {
	readonly prefix: string;
	readonly suffix: string;
} {
	const at = template.indexOf(PATH_PLACEHOLDER);
	if (at === -1) return { prefix: template, suffix: "" };
	return {
		prefix: template.slice(0, at),
		suffix: template.slice(at + PATH_PLACEHOLDER.length),
	};
}

/**
 * Renders the template with the normalized path.
 *
 * Concatenation rather than `String.replace`, so `$&` and friends in a path
 * stay literal.
 */
export function renderHeader(template: string, filePath: string): string {
	const { prefix, suffix } = splitTemplate(template);
	const hasPlaceholder = template.includes(PATH_PLACEHOLDER);
	const body = hasPlaceholder
		? `${prefix}${normalizeBannerPath(filePath)}${suffix}`
		: template;
	return `${body}\n`;
}

/**
 * Banner shape recognition.
 *
 * @invariant line starts with "#!" → false
 * @invariant trimmed prefix and suffix both empty → false (would match anything)
 */
export function matchesHeaderShape(template: string, line: string): boolean {
	if (line.startsWith(SHEBANG_MARKER)) return false;
	if (template.length === 0) return false;

	const { prefix, suffix } = splitTemplate(template);
	const head = prefix.trim();
	const tail = suffix.trim();
	if (head.length === 0 && tail.length === 0) return false;

	const stripped = line.trim();
	return stripped.startsWith(head) && stripped.endsWith(tail);
}

/**
 * Assembles a strategy from its family rule; expected-header and shape
 * recognition are shared by every family.
 */
export function makeStrategy(
	kind: StrategyKind,
	template: string,
	rule: InsertionRule,
): HeaderStrategy {
	return {
		kind,
		template,
		expectedHeader: (filePath) => renderHeader(template, filePath),
		isHeaderLine: (line) => matchesHeaderShape(template, line),
		insertionPoint: rule,
	};
}
