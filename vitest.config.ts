import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
		},
	},
});
