import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**"],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
	resolve: {
		alias: [
			{ find: "@pgwarden/core/db", replacement: fromRoot("./packages/core/src/db/index.ts") },
			{ find: "@pgwarden/core/error", replacement: fromRoot("./packages/core/src/error/index.ts") },
			{ find: "@pgwarden/core/logger", replacement: fromRoot("./packages/core/src/logger/index.ts") },
			{ find: "@pgwarden/core/config", replacement: fromRoot("./packages/core/src/config/index.ts") },
			{ find: "@pgwarden/core", replacement: fromRoot("./packages/core/src/index.ts") },
			{ find: "@pgwarden/pg", replacement: fromRoot("./packages/pg/src/index.ts") },
			{ find: "@pgwarden/test-utils", replacement: fromRoot("./packages/test-utils/src/index.ts") },
		],
	},
});
