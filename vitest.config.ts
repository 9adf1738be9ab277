// CHANGE: Vitest configuration for CORE/SHELL/APP tests
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; temp directories are created and removed per test
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts"],
			// CHANGE: CORE is pure and fully reachable from unit tests
			// INVARIANT: ∀ f ∈ src/core/**/*.ts: lines(f) ≥ 90%
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 90,
					lines: 90,
					statements: 90,
				},
			},
		},

		// CHANGE: Reset spies between tests
		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
