// CHANGE: Vitest configuration for the generator test suite
// WHY: Native ESM, explicit imports, node environment for file-system specs
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; each spec cleans up its own temporary files

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		// test/main.test.ts changes the working directory, which worker threads forbid
		pool: "forks",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: 100% coverage for CORE, lower floor for SHELL/APP
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				"src/main.ts": {
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
