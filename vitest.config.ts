// CHANGE: Vitest configuration for CORE/SHELL specs under test/
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects outside os.tmpdir()

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 90,
					lines: 90,
					statements: 90,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
