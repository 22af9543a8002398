import { fileURLToPath } from "node:url";
import { defineProject } from "vitest/config";

export default defineProject({
	resolve: {
		alias: {
			"@iocsweep/core": fileURLToPath(new URL("../core/src/index.ts", import.meta.url)),
		},
	},
	test: {
		name: "cli",
		environment: "node",
	},
});
