import { definePermissions, type Permission } from "../model/Permission";
import { defineRoles, type NewRole, type Role, type UpdateRole } from "../model/Role";
import { defineRolePermissions } from "../model/RolePermission";
import { defineUserRoles } from "../model/UserRole";
import { ForbiddenError } from "../util/AppError";
import { getLog } from "../util/Logger";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface RoleWithPermissions extends Role {
	permissions: Array<Permission>;
}

export interface RoleDao {
	listAll(): Promise<Array<Role>>;
	findById(id: number): Promise<Role | undefined>;
	findByName(name: string): Promise<Role | undefined>;
	/** Returns the named role, creating a bare one if it does not exist yet. */
	ensureRole(name: string): Promise<Role>;
	/** Creates the role, or updates its labels and flags when the name exists. */
	upsertByName(role: NewRole): Promise<Role>;
	create(role: NewRole): Promise<Role>;
	/** Fails for roles that are not editable */
	update(id: number, updates: UpdateRole): Promise<Role | undefined>;
	/** Fails for roles that are not editable */
	delete(id: number): Promise<boolean>;
	getPermissions(roleId: number): Promise<Array<Permission>>;
	getRoleWithPermissions(id: number): Promise<RoleWithPermissions | undefined>;
	/** Replaces the role's permission attachments with exactly the given ids. */
	syncPermissions(roleId: number, permissionIds: Array<number>): Promise<void>;
	/**
	 * Empties user_roles, role_permissions, roles and permissions with
	 * foreign-key enforcement suspended for the duration of one transaction.
	 */
	truncateAccessTables(): Promise<void>;
}

export function createRoleDao(sequelize: Sequelize): RoleDao {
	const Roles = defineRoles(sequelize);
	const Permissions = definePermissions(sequelize);
	const RolePermissions = defineRolePermissions(sequelize);
	const UserRoles = defineUserRoles(sequelize);

	return {
		listAll,
		findById,
		findByName,
		ensureRole,
		upsertByName,
		create,
		update,
		delete: deleteRole,
		getPermissions,
		getRoleWithPermissions,
		syncPermissions,
		truncateAccessTables,
	};

	async function listAll(): Promise<Array<Role>> {
		const roles = await Roles.findAll({ order: [["name", "ASC"]] });
		return roles.map(r => r.get({ plain: true }));
	}

	async function findById(id: number): Promise<Role | undefined> {
		const role = await Roles.findByPk(id);
		return role ? role.get({ plain: true }) : undefined;
	}

	async function findByName(name: string): Promise<Role | undefined> {
		const role = await Roles.findOne({ where: { name } });
		return role ? role.get({ plain: true }) : undefined;
	}

	async function ensureRole(name: string): Promise<Role> {
		const existing = await findByName(name);
		if (existing) {
			return existing;
		}
		return create({ name, displayName: null, description: null, isPrivate: false, isEditable: true });
	}

	async function upsertByName(role: NewRole): Promise<Role> {
		const existing = await findByName(role.name);
		if (!existing) {
			return create(role);
		}
		const updates: UpdateRole = {
			displayName: role.displayName,
			description: role.description,
			isPrivate: role.isPrivate,
			isEditable: role.isEditable,
		};
		await Roles.update(updates, { where: { id: existing.id } });
		return { ...existing, ...updates };
	}

	async function create(role: NewRole): Promise<Role> {
		const created = await Roles.create(role);
		return created.get({ plain: true });
	}

	async function update(id: number, updates: UpdateRole): Promise<Role | undefined> {
		const role = await findById(id);
		if (!role) {
			return;
		}
		if (!role.isEditable) {
			throw new ForbiddenError(`Role ${role.name} cannot be modified`);
		}
		await Roles.update(updates, { where: { id } });
		return findById(id);
	}

	async function deleteRole(id: number): Promise<boolean> {
		const role = await findById(id);
		if (!role) {
			return false;
		}
		if (!role.isEditable) {
			throw new ForbiddenError(`Role ${role.name} cannot be deleted`);
		}
		const count = await sequelize.transaction(async transaction => {
			await RolePermissions.destroy({ where: { roleId: id }, transaction });
			await UserRoles.destroy({ where: { roleId: id }, transaction });
			return Roles.destroy({ where: { id }, transaction });
		});
		return count > 0;
	}

	async function getPermissions(roleId: number): Promise<Array<Permission>> {
		const links = await RolePermissions.findAll({ where: { roleId } });
		if (links.length === 0) {
			return [];
		}
		const permissions = await Permissions.findAll({
			where: { id: links.map(link => link.get({ plain: true }).permissionId) },
			order: [["name", "ASC"]],
		});
		return permissions.map(p => p.get({ plain: true }));
	}

	async function getRoleWithPermissions(id: number): Promise<RoleWithPermissions | undefined> {
		const role = await findById(id);
		if (!role) {
			return;
		}
		return { ...role, permissions: await getPermissions(id) };
	}

	async function syncPermissions(roleId: number, permissionIds: Array<number>): Promise<void> {
		const unique = [...new Set(permissionIds)];
		await sequelize.transaction(async transaction => {
			await RolePermissions.destroy({ where: { roleId }, transaction });
			if (unique.length > 0) {
				await RolePermissions.bulkCreate(
					unique.map(permissionId => ({ roleId, permissionId })),
					{ transaction },
				);
			}
		});
	}

	/**
	 * Empties the access tables with foreign-key triggers off. Setting
	 * session_replication_role needs superuser, or on Postgres 15+ a
	 * `GRANT SET ON PARAMETER session_replication_role` to the app role.
	 */
	async function truncateAccessTables(): Promise<void> {
		await sequelize.transaction(async transaction => {
			// SET LOCAL is undone when the transaction ends, including on rollback
			await sequelize.query("SET LOCAL session_replication_role = 'replica'", { transaction });
			await UserRoles.destroy({ where: {}, transaction });
			await RolePermissions.destroy({ where: {}, transaction });
			await Roles.destroy({ where: {}, transaction });
			await Permissions.destroy({ where: {}, transaction });
			await sequelize.query("SET LOCAL session_replication_role = 'origin'", { transaction });
		});
		log.info("Truncated role and permission tables");
	}
}
