import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			exclude: ["**/index.ts", "src/types/**"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
		},
		globals: true,
		pool: "forks",
		restoreMocks: true,
	},
});
