import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		// sharp fixtures are generated on the fly
		testTimeout: 20000,
	},
});
