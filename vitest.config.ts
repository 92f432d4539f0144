import { createRequire } from "node:module";
import { defineConfig } from "vitest/config";

const require = createRequire(import.meta.url);

export default defineConfig({
	resolve: {
		// drizzle-kit's ESM build of its API does `require("fs")`, which fails under ESM; load the CommonJS build.
		alias: { "drizzle-kit/api": require.resolve("drizzle-kit/api") },
	},
	test: {
		environment: "node",
		include: ["src/**/*.test.ts"],
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});
