import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Junction table linking roles to their permissions.
 */
export interface RolePermission {
	readonly roleId: number;
	readonly permissionId: number;
	readonly createdAt: Date;
}

export type NewRolePermission = Omit<RolePermission, "createdAt">;

export function defineRolePermissions(sequelize: Sequelize): ModelDef<RolePermission, NewRolePermission> {
	const existing = sequelize.models?.role_permission;
	if (existing) {
		return existing;
	}
	return sequelize.define("role_permission", schema, {
		timestamps: true,
		updatedAt: false,
		underscored: true,
		tableName: "role_permissions",
	});
}

const schema = {
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
	permissionId: {
		type: DataTypes.INTEGER,
		allowNull: false,
		primaryKey: true,
		references: {
			model: "permissions",
			key: "id",
		},
		onDelete: "CASCADE",
	},
};
