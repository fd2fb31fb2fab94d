import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL("./apps/server/src", import.meta.url)),
		},
	},
	test: {
		include: ["apps/*/tests/**/*.test.ts"],
		environment: "node",
	},
});
