// vitest.config.ts
// Tests run in plain Node against an in-memory better-sqlite3 database.
// No external services: the fetch handler is invoked directly with Request objects.
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["test/**/*.spec.ts"],
		environment: "node",
		setupFiles: ["./test/setup.ts"],
	},
});
