/**
 * TenantDatabase - DAO factory for one tenant's datastore.
 *
 * The Sequelize instance handed in is already bound to the tenant's schema or
 * database (see TenantSequelizeFactory), so model definitions carry no schema
 * of their own.
 *
 * @module TenantDatabase
 */

import { createPermissionDao, type PermissionDao } from "../dao/PermissionDao";
import { createRoleDao, type RoleDao } from "../dao/RoleDao";
import { createUserDao, type UserDao } from "../dao/UserDao";
import { definePermissions } from "../model/Permission";
import { defineRoles } from "../model/Role";
import { defineRolePermissions } from "../model/RolePermission";
import { defineUsers } from "../model/User";
import { defineUserRoles } from "../model/UserRole";
import { getLog } from "../util/Logger";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface TenantDatabase {
	readonly userDao: UserDao;
	readonly roleDao: RoleDao;
	readonly permissionDao: PermissionDao;
	/** Brings the tenant tables up to the current model definitions. Safe to repeat. */
	migrate(): Promise<void>;
}

export function createTenantDatabase(sequelize: Sequelize): TenantDatabase {
	// Referenced tables first so sync() creates foreign keys in order
	defineRoles(sequelize);
	definePermissions(sequelize);
	defineRolePermissions(sequelize);
	defineUsers(sequelize);
	defineUserRoles(sequelize);

	return {
		userDao: createUserDao(sequelize),
		roleDao: createRoleDao(sequelize),
		permissionDao: createPermissionDao(sequelize),
		migrate,
	};

	async function migrate(): Promise<void> {
		log.info("Syncing tenant models");
		await sequelize.sync();
		log.info("Tenant models synced");
	}
}
