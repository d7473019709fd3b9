// FORMAT THEOREM: select(name) = family(key(name))(table[key(name)]) when table[key] ≠ ""
// PURITY: CORE
// INVARIANT: Lookup only; no inspection of file content
// COMPLEXITY: O(|name|)

import { match, P } from "ts-pattern";

import type { StyleTable } from "../types/index.js";
import type { HeaderStrategy } from "./base.js";
import {
	buildRecipeStrategy,
	declarationStrategy,
	frontmatterStrategy,
	scriptMetadataStrategy,
	shebangStrategy,
	tagOpeningStrategy,
} from "./variants.js";

const BUILD_RECIPE_KEY = ".dockerfile";

const BUILD_RECIPE_NAME = /^(?:dockerfile|containerfile)(?:\..+)?$/u;

export const SCRIPT_METADATA_KEYS: ReadonlySet<string> = new Set([
	".py",
	".pyi",
	".pyw",
	".pyx",
	".rb",
]);

export const TAG_OPENING_KEYS: ReadonlySet<string> = new Set([
	".php",
	".phtml",
	".php3",
	".php4",
	".phps",
]);

export const FRONTMATTER_KEYS: ReadonlySet<string> = new Set([
	".md",
	".markdown",
	".astro",
]);

export const DECLARATION_KEYS: ReadonlySet<string> = new Set([
	".xml",
	".html",
	".htm",
	".xhtml",
	".jhtml",
	".svg",
	".vue",
	".svelte",
	".aspx",
	".ascx",
	".cshtml",
	".razor",
	".jsp",
	".css",
	".scss",
	".less",
]);

/**
 * Last path segment, accepting both separators.
 */
function baseName(filePath: string): string {
	const segments = filePath.split(/[\\/]/u);
	return segments.at(-1) ?? filePath;
}

function extensionOf(name: string): string {
	const dot = name.lastIndexOf(".");
	return dot > 0 ? name.slice(dot) : "";
}

/**
 * Style-table key for a file name.
 *
 * @example
 * fileTypeKey("src/App.TSX");     // => ".tsx"
 * fileTypeKey("Dockerfile.prod"); // => ".dockerfile"
 * fileTypeKey(".bashrc");         // => ".bashrc"
 */
export function fileTypeKey(fileName: string): string {
	const lowered = baseName(fileName).toLowerCase();
	if (BUILD_RECIPE_NAME.test(lowered)) return BUILD_RECIPE_KEY;

	const extension = extensionOf(lowered);
	if (extension.length === 0 && lowered.startsWith(".")) return lowered;
	return extension;
}

/**
 * Template for `key`, or undefined when the type is unknown or disabled.
 */
export function lookupStyle(
	table: StyleTable,
	key: string,
): string | undefined {
	const template = table.get(key);
	return template === undefined || template.length === 0
		? undefined
		: template;
}

const inSet =
	(set: ReadonlySet<string>) =>
	(key: string): boolean =>
		set.has(key);

/**
 * Strategy for a file name, or undefined when the type is unsupported
 * (callers skip such files silently).
 */
export function selectStrategy(
	fileName: string,
	table: StyleTable,
): HeaderStrategy | undefined {
	const key = fileTypeKey(fileName);
	const template = lookupStyle(table, key);
	if (template === undefined) return undefined;

	return match(key)
		.with(P.when(inSet(SCRIPT_METADATA_KEYS)), () =>
			scriptMetadataStrategy(template),
		)
		.with(P.when(inSet(TAG_OPENING_KEYS)), () => tagOpeningStrategy(template))
		.with(P.when(inSet(FRONTMATTER_KEYS)), () =>
			frontmatterStrategy(template),
		)
		.with(P.when(inSet(DECLARATION_KEYS)), () =>
			declarationStrategy(template),
		)
		.with(BUILD_RECIPE_KEY, () => buildRecipeStrategy(template))
		.otherwise(() => shebangStrategy(template));
}

/**
 * Mandatory exclusions match on exact base name, before any extension logic.
 */
export function isAlwaysSkipped(
	filePath: string,
	alwaysSkip: ReadonlySet<string>,
): boolean {
	return alwaysSkip.has(baseName(filePath));
}
