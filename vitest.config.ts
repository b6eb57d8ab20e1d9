import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@fbg-logger/common": fileURLToPath(new URL("./packages/common/src/index.ts", import.meta.url))
		}
	},
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts", "receiver/src/**/*.test.ts"],
		testTimeout: 10_000
	}
});
