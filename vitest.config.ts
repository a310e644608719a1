import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// loadConfig tests chdir into temp directories
		pool: "forks",
	},
})
