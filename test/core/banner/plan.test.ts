// FORMAT THEOREM: fix is idempotent; remove undoes an added banner
// PURITY: CORE

import { Effect } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { classifyHeader, planBanner } from "../../../src/core/banner/plan.js";
import type { RunMode } from "../../../src/core/models.js";
import {
	type HeaderStrategy,
	scriptMetadataStrategy,
	selectStrategy,
	shebangStrategy,
	tagOpeningStrategy,
} from "../../../src/core/strategies/index.js";
import { loadDefaultConfig } from "../../../src/shell/config/index.js";

const strategy = shebangStrategy("# File: {}");
const plan = (text: string, mode: RunMode) =>
	planBanner({ filePath: "run.sh", text, strategy, mode });

describe("planBanner: fix mode", () => {
	it("adds a missing banner at the top", () => {
		expect(plan("echo hi\n", "fix")).toEqual({
			_tag: "Write",
			action: "added",
			content: "# File: run.sh\necho hi\n",
		});
	});

	it("adds below a shebang and terminates the last line", () => {
		expect(plan("#!/bin/sh\necho hi", "fix")).toEqual({
			_tag: "Write",
			action: "added",
			content: "#!/bin/sh\n# File: run.sh\necho hi\n",
		});
	});

	it("appends after a file holding only a shebang", () => {
		expect(plan("#!/bin/sh", "fix")).toEqual({
			_tag: "Write",
			action: "added",
			content: "#!/bin/sh\n# File: run.sh\n",
		});
	});

	it("replaces a banner naming another path", () => {
		expect(plan("# File: old.sh\necho\n", "fix")).toEqual({
			_tag: "Write",
			action: "updated",
			content: "# File: run.sh\necho\n",
		});
	});

	it("keeps CRLF lines as they are", () => {
		expect(plan("a\r\nb\r\n", "fix")).toEqual({
			_tag: "Write",
			action: "added",
			content: "# File: run.sh\na\r\nb\r\n",
		});
	});

	it("keeps a correct banner", () => {
		expect(plan("# File: run.sh\necho\n", "fix")).toEqual({
			_tag: "Keep",
			status: "correct",
		});
	});

	it("compares banners ignoring surrounding whitespace", () => {
		expect(plan("# File: run.sh  \r\necho\n", "fix")).toEqual({
			_tag: "Keep",
			status: "correct",
		});
	});

	it("renders the path given to the planner", () => {
		const result = planBanner({
			filePath: "app/main.py",
			text: "print('x')\n",
			strategy: scriptMetadataStrategy("# File: {}"),
			mode: "fix",
		});
		expect(result).toEqual({
			_tag: "Write",
			action: "added",
			content: "# File: app/main.py\nprint('x')\n",
		});
	});
});

describe("planBanner: check mode", () => {
	it("reports a missing banner", () => {
		expect(plan("echo\n", "check")).toEqual({
			_tag: "Report",
			status: "missing",
		});
	});

	it("reports an incorrect banner", () => {
		expect(plan("# File: old.sh\n", "check")).toEqual({
			_tag: "Report",
			status: "incorrect",
		});
	});

	it("keeps a correct banner", () => {
		expect(plan("# File: run.sh\n", "check")).toEqual({
			_tag: "Keep",
			status: "correct",
		});
	});
});

describe("planBanner: remove mode", () => {
	it("removes a correct banner", () => {
		expect(plan("#!/bin/sh\n# File: run.sh\necho\n", "remove")).toEqual({
			_tag: "Write",
			action: "removed",
			content: "#!/bin/sh\necho\n",
		});
	});

	it("removes an incorrect banner", () => {
		expect(plan("# File: old.sh\necho\n", "remove")).toEqual({
			_tag: "Write",
			action: "removed",
			content: "echo\n",
		});
	});

	it("keeps a file without a banner", () => {
		expect(plan("echo\n", "remove")).toEqual({
			_tag: "Keep",
			status: "missing",
		});
	});
});

describe("planBanner: skips", () => {
	it("skips text starting with a byte-order mark", () => {
		expect(plan("\uFEFFecho\n", "fix")).toEqual({
			_tag: "Skip",
			reason: "byte-order-mark",
		});
	});

	it("skips empty text", () => {
		expect(plan("", "fix")).toEqual({ _tag: "Skip", reason: "empty" });
	});

	it("passes the strategy's refusal through", () => {
		const result = planBanner({
			filePath: "page.php",
			text: "<html>\n",
			strategy: tagOpeningStrategy("// File: {}"),
			mode: "fix",
		});
		expect(result).toEqual({ _tag: "Skip", reason: "no-script-tag" });
	});
});

describe("classifyHeader", () => {
	it("is missing past the end of file", () => {
		expect(classifyHeader(undefined, "# File: a\n", strategy)).toBe("missing");
	});

	it("is missing for an ordinary line", () => {
		expect(classifyHeader("echo\n", "# File: a\n", strategy)).toBe("missing");
	});
});

describe("planBanner properties", () => {
	const line = fc.constantFrom(
		"echo hi\n",
		"#!/bin/sh\n",
		"# comment\n",
		"# File: other.sh\n",
		"\n",
		"x=1\r\n",
	);
	const text = fc.array(line, { minLength: 1, maxLength: 6 }).map((ls) => ls.join(""));

	it("a fixed file needs no further fix", () => {
		fc.assert(
			fc.property(text, (t) => {
				const first = plan(t, "fix");
				if (first._tag !== "Write") return true;
				const second = plan(first.content, "fix");
				return second._tag === "Keep" && second.status === "correct";
			}),
		);
	});

	it("removing an added banner restores the file", () => {
		fc.assert(
			fc.property(text, (t) => {
				const added = plan(t, "fix");
				if (added._tag !== "Write" || added.action !== "added") return true;
				const removed = plan(added.content, "remove");
				return removed._tag === "Write" && removed.content === t;
			}),
		);
	});

	it("never writes in check mode", () => {
		fc.assert(
			fc.property(text, (t) => plan(t, "check")._tag !== "Write"),
		);
	});
});

describe("planBanner properties for every strategy family", () => {
	const { styles } = Effect.runSync(loadDefaultConfig());
	const names = [
		"run.sh",
		"src/app.ts",
		"pkg/main.py",
		"lib/tool.rb",
		"Dockerfile",
		"deploy/Containerfile.prod",
		"web/page.html",
		"data/feed.xml",
		"theme.css",
		"index.php",
		"docs/README.md",
		"site/page.astro",
		"query.sql",
		".bashrc",
	];
	const files = names.map((filePath): {
		readonly filePath: string;
		readonly strategy: HeaderStrategy;
	} => {
		const strategy = selectStrategy(filePath, styles);
		if (strategy === undefined) throw new Error(`no strategy for ${filePath}`);
		return { filePath, strategy };
	});

	const line = fc.constantFrom(
		"#!/usr/bin/env sh\n",
		"# -*- coding: utf-8 -*-\n",
		"# syntax=docker/dockerfile:1\n",
		'<?xml version="1.0"?>\n',
		"<!DOCTYPE html>\n",
		'@charset "utf-8";\n',
		"<?php\n",
		"---\n",
		"title: x\n",
		"# File: stale\n",
		"// File: stale\n",
		"<!-- File: stale -->\n",
		"/* File: stale */\n",
		"body\n",
		"\n",
		"x = 1\r\n",
	);
	const text = fc
		.array(line, { minLength: 1, maxLength: 8 })
		.map((ls) => ls.join(""));
	const file = fc.constantFrom(...files);

	const planFor = (
		f: (typeof files)[number],
		t: string,
		mode: RunMode,
	) => planBanner({ filePath: f.filePath, text: t, strategy: f.strategy, mode });

	it("covers all six families", () => {
		expect(new Set(files.map((f) => f.strategy.kind)).size).toBe(6);
	});

	it("a fixed file needs no further fix", () => {
		fc.assert(
			fc.property(file, text, (f, t) => {
				const first = planFor(f, t, "fix");
				if (first._tag !== "Write") return true;
				const second = planFor(f, first.content, "fix");
				return second._tag === "Keep" && second.status === "correct";
			}),
		);
	});

	it("removing an added banner restores the file", () => {
		fc.assert(
			fc.property(file, text, (f, t) => {
				const added = planFor(f, t, "fix");
				if (added._tag !== "Write" || added.action !== "added") return true;
				const removed = planFor(f, added.content, "remove");
				return removed._tag === "Write" && removed.content === t;
			}),
		);
	});
});
