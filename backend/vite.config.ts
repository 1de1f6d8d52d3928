import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: [
			{
				find: /^storefront-common$/,
				replacement: fileURLToPath(new URL("../common/src/index.ts", import.meta.url)),
			},
		],
	},
	test: {
		coverage: {
			exclude: ["**/*.mock.ts", "src/test/**", "src/Main.ts", "src/cli/Tenants.ts"],
			include: ["src/**/*.ts"],
			reporter: ["text"],
		},
		env: {
			DISABLE_LOGGING: "true",
			LOG_LEVEL: "info",
			LOG_TRANSPORTS: "console",
			TOKEN_SECRET: "test-secret",
		},
		restoreMocks: true,
		setupFiles: ["./src/test/setup.ts"],
	},
});
