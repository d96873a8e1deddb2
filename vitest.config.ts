import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
	},
})
