import type { Transaction } from "sequelize";

/**
 * Options for DAO writes that may join an enclosing transaction.
 */
export interface DaoWriteOptions {
	transaction?: Transaction;
}
