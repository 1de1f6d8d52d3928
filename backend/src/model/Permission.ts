import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

export interface Permission {
	readonly id: number;
	/** Slug of the form `{action}-{module}`, e.g. "create-users" */
	readonly name: string;
	readonly displayName: string | null;
	readonly description: string | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewPermission = Omit<Permission, "id" | "createdAt" | "updatedAt">;

export function definePermissions(sequelize: Sequelize): ModelDef<Permission, NewPermission> {
	const existing = sequelize.models?.permission;
	if (existing) {
		return existing;
	}
	return sequelize.define("permission", schema, {
		timestamps: true,
		underscored: true,
		tableName: "permissions",
	});
}

const schema = {
	id: {
		type: DataTypes.INTEGER,
		autoIncrement: true,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(150),
		allowNull: false,
		unique: "permissions_name_key",
	},
	displayName: {
		type: DataTypes.STRING(255),
		allowNull: true,
	},
	description: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
};
