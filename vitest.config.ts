import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		// PGlite boots a WASM Postgres per test database
		testTimeout: 30000,
	},
});
