import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

export interface Role {
	readonly id: number;
	/** Natural key used by seeding, e.g. "merchant_admin" */
	readonly name: string;
	readonly displayName: string | null;
	readonly description: string | null;
	/** Private roles are hidden from role listings */
	readonly isPrivate: boolean;
	readonly isEditable: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewRole = Omit<Role, "id" | "createdAt" | "updatedAt">;

export type UpdateRole = {
	displayName?: string | null;
	description?: string | null;
	isPrivate?: boolean;
	isEditable?: boolean;
};

export function defineRoles(sequelize: Sequelize): ModelDef<Role, NewRole> {
	const existing = sequelize.models?.role;
	if (existing) {
		return existing;
	}
	return sequelize.define("role", schema, {
		timestamps: true,
		underscored: true,
		tableName: "roles",
	});
}

const schema = {
	id: {
		type: DataTypes.INTEGER,
		autoIncrement: true,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(100),
		allowNull: false,
		unique: "roles_name_key",
	},
	displayName: {
		type: DataTypes.STRING(255),
		allowNull: true,
	},
	description: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	isPrivate: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	isEditable: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: true,
	},
};
