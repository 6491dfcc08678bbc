import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/ui.ts", "src/logger.ts"],
			thresholds: {
				// Event handling - correctness critical
				"src/watch/classifier.ts": { statements: 90, branches: 85 },
				"src/watch/router.ts": { statements: 75, branches: 60 },
				// Integrity critical
				"src/hash.ts": { statements: 95, branches: 90 },
				"src/install/content-library.ts": { statements: 80 },
			},
		},
	},
})
