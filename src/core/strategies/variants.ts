// FORMAT THEOREM: ∀lines: rule(lines) = InsertAt(i) → 0 ≤ i ≤ |lines|
// PURITY: CORE
// INVARIANT: rule([]) = InsertAt(0) for every family
// COMPLEXITY: O(k) where k = bounded preamble lookahead (≤ |lines|)

import type { InsertionPoint } from "../types/index.js";
import {
	type HeaderStrategy,
	insertAt,
	makeStrategy,
	SHEBANG_MARKER,
	skipFile,
} from "./base.js";

/** Encoding declarations may only sit on the first two lines. */
const METADATA_LOOKAHEAD = 2;
/** PEP 263 / Ruby magic comment: `coding` directly followed by `:` or `=`. */
const ENCODING_COOKIE = /^#.*?coding[:=]/u;

const BUILD_DIRECTIVES: ReadonlySet<string> = new Set([
	"syntax",
	"escape",
	"check",
]);

const DECLARATION_LOOKAHEAD = 20;
const CHARSET_LOOKAHEAD = 5;

const SCRIPT_OPEN_TAG = "<?";
const SCRIPT_CLOSE_TAG = "?>";
const FRONTMATTER_FENCE = "---";

function shebangIndex(lines: ReadonlyArray<string>): number {
	const first = lines.at(0);
	return first?.startsWith(SHEBANG_MARKER) === true ? 1 : 0;
}

/**
 * First index in [from, min(|lines|, limit)) whose line satisfies `predicate`.
 */
function findLine(
	lines: ReadonlyArray<string>,
	from: number,
	limit: number,
	predicate: (line: string) => boolean,
): number | undefined {
	const end = Math.min(lines.length, limit);
	for (let i = from; i < end; i++) {
		const line = lines[i];
		if (line !== undefined && predicate(line)) return i;
	}
	return undefined;
}

export function shebangInsertion(
	lines: ReadonlyArray<string>,
): InsertionPoint {
	return insertAt(shebangIndex(lines));
}

export function scriptMetadataInsertion(
	lines: ReadonlyArray<string>,
): InsertionPoint {
	const start = shebangIndex(lines);
	const cookie = findLine(lines, start, METADATA_LOOKAHEAD, (line) =>
		ENCODING_COOKIE.test(line.trim()),
	);
	return insertAt(cookie === undefined ? start : cookie + 1);
}

function isParserDirective(line: string): boolean {
	const stripped = line.trim();
	if (!stripped.startsWith("#")) return false;
	const content = stripped.slice(1).trim().toLowerCase();
	const separator = content.indexOf("=");
	if (separator === -1) return false;
	return BUILD_DIRECTIVES.has(content.slice(0, separator).trim());
}

export function buildRecipeInsertion(
	lines: ReadonlyArray<string>,
): InsertionPoint {
	let index = shebangIndex(lines);
	while (index < lines.length && isParserDirective(lines[index] ?? "")) {
		index++;
	}
	return insertAt(index);
}

function isTagDeclaration(firstLine: string): boolean {
	return (
		firstLine.startsWith("<?xml") ||
		firstLine.toLowerCase().startsWith("<!doctype") ||
		firstLine.startsWith("<%@")
	);
}

/**
 * Skips one leading declaration: XML prolog, DOCTYPE, ASP/JSP directive,
 * CSS `@charset` or Razor `@page`.
 *
 * @postcondition unterminated declaration within its lookahead → Skip
 */
export function declarationInsertion(
	lines: ReadonlyArray<string>,
): InsertionPoint {
	const first = lines.at(0)?.trim();
	if (first === undefined) return insertAt(0);
	const lower = first.toLowerCase();

	if (isTagDeclaration(first)) {
		const close = findLine(lines, 0, DECLARATION_LOOKAHEAD, (line) =>
			line.includes(">"),
		);
		return close === undefined
			? skipFile("unterminated-declaration")
			: insertAt(close + 1);
	}

	if (lower.startsWith("@charset")) {
		const close = findLine(lines, 0, CHARSET_LOOKAHEAD, (line) =>
			line.includes(";"),
		);
		return close === undefined
			? skipFile("unterminated-charset")
			: insertAt(close + 1);
	}

	// Razor @page directives never span lines.
	if (lower.startsWith("@page")) return insertAt(1);

	return insertAt(0);
}

/**
 * Banner goes right after the opening script tag.
 *
 * @postcondition no open tag → Skip: the file is plain markup for the host
 * and a comment there would render as visible text
 */
export function tagOpeningInsertion(
	lines: ReadonlyArray<string>,
): InsertionPoint {
	if (lines.length === 0) return insertAt(0);
	const index = shebangIndex(lines);
	const line = lines.at(index)?.trim();

	if (line === undefined || !line.startsWith(SCRIPT_OPEN_TAG)) {
		return skipFile("no-script-tag");
	}
	if (line.toLowerCase().startsWith("<?xml")) {
		return skipFile("xml-declaration");
	}
	if (line.includes(SCRIPT_CLOSE_TAG)) {
		return skipFile("single-line-script");
	}
	return insertAt(index + 1);
}

export function frontmatterInsertion(
	lines: ReadonlyArray<string>,
): InsertionPoint {
	if (lines.at(0)?.trim() !== FRONTMATTER_FENCE) return insertAt(0);
	const close = findLine(
		lines,
		1,
		lines.length,
		(line) => line.trim() === FRONTMATTER_FENCE,
	);
	return close === undefined
		? skipFile("unclosed-frontmatter")
		: insertAt(close + 1);
}

export const shebangStrategy = (template: string): HeaderStrategy =>
	makeStrategy("shebang", template, shebangInsertion);

export const scriptMetadataStrategy = (template: string): HeaderStrategy =>
	makeStrategy("script-metadata", template, scriptMetadataInsertion);

export const buildRecipeStrategy = (template: string): HeaderStrategy =>
	makeStrategy("build-recipe", template, buildRecipeInsertion);

export const declarationStrategy = (template: string): HeaderStrategy =>
	makeStrategy("declaration", template, declarationInsertion);

export const tagOpeningStrategy = (template: string): HeaderStrategy =>
	makeStrategy("tag-opening", template, tagOpeningInsertion);

export const frontmatterStrategy = (template: string): HeaderStrategy =>
	makeStrategy("frontmatter", template, frontmatterInsertion);
