import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";
import type { UserStatus } from "storefront-common";

export const USER_STATUSES: ReadonlyArray<UserStatus> = ["inactive", "active", "pending", "suspended"];

/**
 * A user of one tenant, stored in that tenant's datastore.
 */
export interface User {
	readonly id: number;
	readonly name: string;
	readonly email: string;
	readonly passwordHash: string;
	readonly status: UserStatus;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewUser = Omit<User, "id" | "createdAt" | "updatedAt">;

export function defineUsers(sequelize: Sequelize): ModelDef<User, NewUser> {
	const existing = sequelize.models?.user;
	if (existing) {
		return existing;
	}
	return sequelize.define("user", schema, {
		timestamps: true,
		underscored: true,
		tableName: "users",
	});
}

const schema = {
	id: {
		type: DataTypes.INTEGER,
		autoIncrement: true,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	email: {
		type: DataTypes.STRING(255),
		allowNull: false,
		unique: "users_email_key",
	},
	passwordHash: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	status: {
		type: DataTypes.ENUM(...USER_STATUSES),
		allowNull: false,
		defaultValue: "active",
	},
};
