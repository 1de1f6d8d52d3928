import { createCentralDatabase } from "./CentralDatabase";
import type { Sequelize } from "sequelize";
import { describe, expect, it, vi } from "vitest";

describe("CentralDatabase", () => {
	function mockSequelize() {
		const transaction = { id: "tx" };
		return {
			sequelize: {
				define: vi.fn().mockReturnValue({}),
				models: {},
				sync: vi.fn().mockResolvedValue(undefined),
				close: vi.fn().mockResolvedValue(undefined),
				transaction: vi.fn(async (work: (t: unknown) => Promise<unknown>) => work(transaction)),
			} as unknown as Sequelize,
			transaction,
		};
	}

	it("defines tenants before domains", () => {
		const { sequelize } = mockSequelize();

		createCentralDatabase(sequelize);

		expect(vi.mocked(sequelize.define).mock.calls.map(call => call[0])).toEqual(["tenant", "domain"]);
	});

	it("hands the transaction to the work callback", async () => {
		const { sequelize, transaction } = mockSequelize();
		const db = createCentralDatabase(sequelize);

		const result = await db.transaction(options => Promise.resolve(options));

		expect(result).toEqual({ transaction });
	});

	it("syncs and closes through sequelize", async () => {
		const { sequelize } = mockSequelize();
		const db = createCentralDatabase(sequelize);

		await db.sync();
		await db.close();

		expect(sequelize.sync).toHaveBeenCalledOnce();
		expect(sequelize.close).toHaveBeenCalledOnce();
	});
});
