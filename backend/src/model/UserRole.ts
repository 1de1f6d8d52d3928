import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Junction table assigning roles to users.
 */
export interface UserRole {
	readonly userId: number;
	readonly roleId: number;
	readonly createdAt: Date;
}

export type NewUserRole = Omit<UserRole, "createdAt">;

export function defineUserRoles(sequelize: Sequelize): ModelDef<UserRole, NewUserRole> {
	const existing = sequelize.models?.user_role;
	if (existing) {
		return existing;
	}
	return sequelize.define("user_role", schema, {
		timestamps: true,
		updatedAt: false,
		underscored: true,
		tableName: "user_roles",
	});
}

const schema = {
	userId: {
		type: DataTypes.INTEGER,
		allowNull: false,
		primaryKey: true,
		references: {
			model: "users",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	roleId: {
		type: DataTypes.INTEGER,
		allowNull: false,
		primaryKey: true,
		references: {
			model: "roles",
			key: "id",
		},
		onDelete: "CASCADE",
	},
};
