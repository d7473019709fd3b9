import { describe, expect, it } from "vitest";

import {
	fileTypeKey,
	isAlwaysSkipped,
	lookupStyle,
	selectStrategy,
} from "../../../src/core/strategies/index.js";
import { testStyles } from "../../utils/builders.js";

describe("fileTypeKey", () => {
	it("lowercases the extension", () => {
		expect(fileTypeKey("src/App.TSX")).toBe(".tsx");
	});

	it("maps build recipes and their variants to one key", () => {
		expect(fileTypeKey("Dockerfile")).toBe(".dockerfile");
		expect(fileTypeKey("deploy/Dockerfile.prod")).toBe(".dockerfile");
		expect(fileTypeKey("Containerfile")).toBe(".dockerfile");
	});

	it("uses the whole name of a dotfile", () => {
		expect(fileTypeKey("home/.bashrc")).toBe(".bashrc");
	});

	it("takes the last extension of a dotfile that has one", () => {
		expect(fileTypeKey(".eslintrc.yml")).toBe(".yml");
	});

	it("is empty for names without an extension", () => {
		expect(fileTypeKey("Makefile")).toBe("");
	});

	it("reads the base name across Windows separators", () => {
		expect(fileTypeKey("src\\lib\\mod.PY")).toBe(".py");
	});
});

describe("lookupStyle", () => {
	it("returns the template of a known key", () => {
		expect(lookupStyle(testStyles, ".ts")).toBe("// File: {}");
	});

	it("treats an empty template as unsupported", () => {
		expect(lookupStyle(testStyles, ".json")).toBeUndefined();
	});

	it("returns undefined for unknown keys", () => {
		expect(lookupStyle(testStyles, ".zzz")).toBeUndefined();
	});
});

describe("selectStrategy", () => {
	const kindOf = (name: string) => selectStrategy(name, testStyles)?.kind;

	it("dispatches each family by key", () => {
		expect(kindOf("main.py")).toBe("script-metadata");
		expect(kindOf("tool.rb")).toBe("script-metadata");
		expect(kindOf("index.php")).toBe("tag-opening");
		expect(kindOf("README.md")).toBe("frontmatter");
		expect(kindOf("page.html")).toBe("declaration");
		expect(kindOf("theme.CSS")).toBe("declaration");
		expect(kindOf("Dockerfile.dev")).toBe("build-recipe");
		expect(kindOf("run.sh")).toBe("shebang");
		expect(kindOf(".bashrc")).toBe("shebang");
		expect(kindOf("app.ts")).toBe("shebang");
	});

	it("carries the table template", () => {
		expect(selectStrategy("page.html", testStyles)?.template).toBe(
			"<!-- File: {} -->",
		);
	});

	it("returns undefined for unsupported types", () => {
		expect(selectStrategy("data.json", testStyles)).toBeUndefined();
		expect(selectStrategy("notes.unknown", testStyles)).toBeUndefined();
		expect(selectStrategy("Makefile", testStyles)).toBeUndefined();
	});
});

describe("isAlwaysSkipped", () => {
	const names = new Set(["package.json", "LICENSE"]);

	it("matches the exact base name at any depth", () => {
		expect(isAlwaysSkipped("pkg/sub/package.json", names)).toBe(true);
		expect(isAlwaysSkipped("LICENSE", names)).toBe(true);
	});

	it("does not match near names", () => {
		expect(isAlwaysSkipped("package.json.bak", names)).toBe(false);
		expect(isAlwaysSkipped("license", names)).toBe(false);
	});
});
