// PURITY: SHELL (configuration only)
// INVARIANT: Tests import describe/it/expect/vi explicitly; mocks are reset between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
			},
		},
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
