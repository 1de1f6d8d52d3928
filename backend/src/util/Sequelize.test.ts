import type { Config } from "../config/Config";
import { createPostgresSequelize, getPostgresConnection, isRetryableConnectionError } from "./Sequelize";
import { describe, expect, it } from "vitest";

describe("isRetryableConnectionError", () => {
	it("returns false for non-Error values", () => {
		expect(isRetryableConnectionError("string error")).toBe(false);
		expect(isRetryableConnectionError(null)).toBe(false);
		expect(isRetryableConnectionError(undefined)).toBe(false);
	});

	it.each(["ECONNREFUSED", "ECONNRESET", "ECONNABORTED", "ENOTFOUND", "EAI_AGAIN", "ETIMEDOUT", "57P03"])(
		"returns true for %s",
		code => {
			const error = Object.assign(new Error("connection failed"), { parent: { code } });
			expect(isRetryableConnectionError(error)).toBe(true);
		},
	);

	it("returns true for timeout in error message", () => {
		expect(isRetryableConnectionError(new Error("Connection timeout exceeded"))).toBe(true);
	});

	it("returns false for authentication failures", () => {
		const error = Object.assign(new Error('password authentication failed for user "postgres"'), {
			parent: { code: "28P01" },
		});
		expect(isRetryableConnectionError(error)).toBe(false);
	});

	it("ignores a parent without a string code", () => {
		const error = Object.assign(new Error("boom"), { parent: { code: 5 } });
		expect(isRetryableConnectionError(error)).toBe(false);
	});
});

describe("createPostgresSequelize", () => {
	const config = {
		POSTGRES_HOST: "db.internal",
		POSTGRES_PORT: 5433,
		POSTGRES_USERNAME: "app",
		POSTGRES_PASSWORD: "test-password",
		POSTGRES_DATABASE: "storefront",
		POSTGRES_SSL: false,
		POSTGRES_LOGGING: false,
		POSTGRES_POOL_MAX: 4,
	} as Config;

	it("maps the configuration onto connection settings", () => {
		expect(getPostgresConnection(config)).toEqual({
			host: "db.internal",
			port: 5433,
			username: "app",
			password: "test-password",
			database: "storefront",
			ssl: false,
			logging: false,
			poolMax: 4,
		});
	});

	it("opens the requested database instead of the default one", async () => {
		const sequelize = createPostgresSequelize(getPostgresConnection(config), "tenant_abc");

		expect(sequelize.getDatabaseName()).toBe("tenant_abc");
		await sequelize.close();
	});
});
