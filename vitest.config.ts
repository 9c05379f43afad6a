import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string): string =>
	fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@mailguard/core": source("./packages/core/src/index.ts"),
			"@mailguard/node": source("./packages/node/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		environment: "node",
	},
});
