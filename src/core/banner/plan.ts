// FORMAT THEOREM: plan(fix, plan(fix, t).content) = Keep(correct) whenever the first plan writes
// PURITY: CORE
// INVARIANT: At most one line is replaced, inserted or removed
// COMPLEXITY: O(n) where n = |text|

import { match } from "ts-pattern";

import type { HeaderStatus, RunMode } from "../models.js";
import type { HeaderStrategy } from "../strategies/index.js";
import type { BannerPlan, ProblemStatus } from "../types/index.js";
import { ensureTrailingTerminator, splitLines } from "./lines.js";

const BYTE_ORDER_MARK = "\uFEFF";

export interface PlanInput {
	readonly filePath: string;
	readonly text: string;
	readonly strategy: HeaderStrategy;
	readonly mode: RunMode;
}

/**
 * Classifies the line sitting where the banner belongs.
 *
 * @param line Line at the insertion index, undefined past the end of file
 */
export function classifyHeader(
	line: string | undefined,
	expected: string,
	strategy: HeaderStrategy,
): HeaderStatus {
	if (line === undefined) return "missing";
	if (line.trim() === expected.trim()) return "correct";
	return strategy.isHeaderLine(line) ? "incorrect" : "missing";
}

function joinWithout(lines: ReadonlyArray<string>, index: number): string {
	return [...lines.slice(0, index), ...lines.slice(index + 1)].join("");
}

function joinWith(
	lines: ReadonlyArray<string>,
	index: number,
	header: string,
	replace: boolean,
): string {
	const tail = lines.slice(replace ? index + 1 : index);
	return [...lines.slice(0, index), header, ...tail].join("");
}

function planRemoval(
	lines: ReadonlyArray<string>,
	index: number,
	status: HeaderStatus,
): BannerPlan {
	if (status === "missing") return { _tag: "Keep", status };
	return {
		_tag: "Write",
		action: "removed",
		content: joinWithout(lines, index),
	};
}

function planFix(
	lines: ReadonlyArray<string>,
	index: number,
	status: ProblemStatus,
	header: string,
): BannerPlan {
	return match(status)
		.with("incorrect", (): BannerPlan => ({
			_tag: "Write",
			action: "updated",
			content: joinWith(lines, index, header, true),
		}))
		.with("missing", (): BannerPlan => ({
			_tag: "Write",
			action: "added",
			content: joinWith(lines, index, header, false),
		}))
		.exhaustive();
}

/**
 * Decides what to do with one file, given its full text.
 *
 * @returns Skip for files that must stay untouched (BOM, empty, unsafe
 * preamble); Keep when nothing needs doing; Report in check mode; Write with
 * the new content in fix/remove mode
 *
 * @pure true
 * @invariant Write.content differs from `text` by exactly one banner line,
 * plus a trailing `\n` when the last line had none
 *
 * @example
 * ```ts
 * planBanner({
 *   filePath: "app/main.py",
 *   text: "print('x')\n",
 *   strategy: scriptMetadataStrategy("# File: {}"),
 *   mode: "fix",
 * });
 * // => { _tag: "Write", action: "added", content: "# File: app/main.py\nprint('x')\n" }
 * ```
 */
export function planBanner(input: PlanInput): BannerPlan {
	const { filePath, text, strategy, mode } = input;
	if (text.startsWith(BYTE_ORDER_MARK)) {
		return { _tag: "Skip", reason: "byte-order-mark" };
	}

	const original = splitLines(text);
	if (original.length === 0) return { _tag: "Skip", reason: "empty" };

	const point = strategy.insertionPoint(original);
	if (point._tag === "Skip") return { _tag: "Skip", reason: point.reason };

	const index = Math.min(point.index, original.length);
	const lines = ensureTrailingTerminator(original);
	const header = strategy.expectedHeader(filePath);
	const status = classifyHeader(lines.at(index), header, strategy);

	if (mode === "remove") return planRemoval(lines, index, status);
	if (status === "correct") return { _tag: "Keep", status };
	if (mode === "check") return { _tag: "Report", status };
	return planFix(lines, index, status, header);
}
