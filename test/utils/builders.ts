// Pure builders shared across tests

import type { BannerConfig, StyleTable } from "../../src/core/types/index.js";

/** Small style table covering one key per strategy family. */
export const testStyles: StyleTable = new Map([
	[".py", "# File: {}"],
	[".rb", "# File: {}"],
	[".sh", "# File: {}"],
	[".ts", "// File: {}"],
	[".dockerfile", "# File: {}"],
	[".bashrc", "# File: {}"],
	[".html", "<!-- File: {} -->"],
	[".css", "/* File: {} */"],
	[".php", "// File: {}"],
	[".md", "<!-- File: {} -->"],
	[".json", ""],
]);

/** Config with the test table, one exclusion and a 1 KiB ceiling. */
export const testConfig = (over: Partial<BannerConfig> = {}): BannerConfig => ({
	styles: testStyles,
	alwaysSkip: new Set(["package.json", "LICENSE"]),
	maxFileSizeBytes: 1024,
	...over,
});
