import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: [
			{
				find: /^storefront-common$/,
				replacement: fileURLToPath(new URL("./common/src/index.ts", import.meta.url)),
			},
		],
	},
	test: {
		include: ["common/src/**/*.test.ts", "backend/src/**/*.test.ts"],
		env: {
			DISABLE_LOGGING: "true",
			LOG_LEVEL: "info",
			LOG_TRANSPORTS: "console",
			TOKEN_SECRET: "test-secret",
		},
		restoreMocks: true,
		setupFiles: ["./backend/src/test/setup.ts"],
	},
});
