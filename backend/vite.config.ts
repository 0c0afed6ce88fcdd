import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		setupFiles: ["./src/test/setup.ts"],
		coverage: {
			exclude: ["src/Main.ts", "src/index.ts", "src/test/**"],
			include: ["src/**"],
			reporter: ["html", "json", "lcov", "text"],
		},
		env: {
			LOG_TRANSPORTS: "console",
			DISABLE_LOGGING: "true",
			API_KEYS: "test-key-1,test-key-2",
		},
		globals: true,
		pool: "threads",
		restoreMocks: true,
	},
});
