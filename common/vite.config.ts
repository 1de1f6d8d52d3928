import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			exclude: ["**/*.mock.ts", "**/index.ts", "src/types/**"],
			include: ["src/**/*.ts"],
			reporter: ["text"],
		},
		env: {
			DISABLE_LOGGING: "true",
		},
		restoreMocks: true,
	},
});
