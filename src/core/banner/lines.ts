// PURITY: CORE
// INVARIANT: splitLines(text).join("") = text
// COMPLEXITY: O(n) where n = |text|

const LINE_SEGMENT = /[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/gu;
const TERMINATOR = /(?:\r\n|\r|\n)$/u;

/**
 * Splits text into lines that keep their own terminator.
 *
 * @example
 * splitLines("a\r\nb\nc"); // => ["a\r\n", "b\n", "c"]
 * splitLines("");          // => []
 */
export function splitLines(text: string): string[] {
	return text.match(LINE_SEGMENT) ?? [];
}

export function hasTerminator(line: string): boolean {
	return TERMINATOR.test(line);
}

/**
 * Copy of `lines` whose last line carries a terminator, so an inserted
 * banner never merges with prior content.
 */
export function ensureTrailingTerminator(
	lines: ReadonlyArray<string>,
): string[] {
	const copy = [...lines];
	const last = copy.at(-1);
	if (last !== undefined && !hasTerminator(last)) {
		copy[copy.length - 1] = `${last}\n`;
	}
	return copy;
}
