import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@modhost/runtime-core": fileURLToPath(new URL("./packages/runtime-core/src/index.ts", import.meta.url)),
			"@modhost/node-runtime": fileURLToPath(new URL("./packages/node-runtime/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/src/__tests__/**/*.test.ts"],
		environment: "node",
		testTimeout: 20000,
	},
});
