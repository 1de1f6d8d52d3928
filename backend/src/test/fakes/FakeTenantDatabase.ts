import type { TenantDatabase } from "../../core/TenantDatabase";
import type { PermissionDao } from "../../dao/PermissionDao";
import type { RoleDao } from "../../dao/RoleDao";
import type { UserDao } from "../../dao/UserDao";
import type { Permission } from "../../model/Permission";
import type { Role } from "../../model/Role";
import type { User } from "../../model/User";
import { ForbiddenError } from "../../util/AppError";

/**
 * In-process stand-in for one tenant's datastore, with the same DAO
 * behaviour as the Sequelize-backed implementations.
 */
export interface FakeTenantDatabase extends TenantDatabase {
	readonly users: Map<number, User>;
	readonly roles: Map<number, Role>;
	readonly permissions: Map<number, Permission>;
	/** roleId -> permission ids */
	readonly rolePermissions: Map<number, Set<number>>;
	/** userId -> role ids */
	readonly userRoles: Map<number, Set<number>>;
	migrated: boolean;
}

export function createFakeTenantDatabase(): FakeTenantDatabase {
	const users = new Map<number, User>();
	const roles = new Map<number, Role>();
	const permissions = new Map<number, Permission>();
	const rolePermissions = new Map<number, Set<number>>();
	const userRoles = new Map<number, Set<number>>();
	const ids = { user: 1, role: 1, permission: 1 };
	const clock = () => new Date("2026-03-01T00:00:00Z");

	const byName = <T extends { name: string }>(rows: Map<number, T>, name: string) =>
		[...rows.values()].find(row => row.name === name);
	const sortByName = <T extends { name: string }>(rows: Array<T>) =>
		[...rows].sort((a, b) => a.name.localeCompare(b.name));

	const userDao: UserDao = {
		create: user => {
			if ([...users.values()].some(u => u.email === user.email)) {
				return Promise.reject(new Error("duplicate key value violates unique constraint \"users_email_key\""));
			}
			const row: User = { id: ids.user++, ...user, createdAt: clock(), updatedAt: clock() };
			users.set(row.id, row);
			return Promise.resolve(row);
		},
		findById: id => Promise.resolve(users.get(id)),
		findByEmail: email => Promise.resolve([...users.values()].find(u => u.email === email)),
		listAll: () => Promise.resolve([...users.values()]),
		setRoles: (userId, roleIds) => {
			userRoles.set(userId, new Set(roleIds));
			return Promise.resolve();
		},
		getRoles: userId =>
			Promise.resolve(
				sortByName([...(userRoles.get(userId) ?? [])].flatMap(id => roles.get(id) ?? [])),
			),
		count: () => Promise.resolve(users.size),
	};

	const roleDao: RoleDao = {
		listAll: () => Promise.resolve(sortByName([...roles.values()])),
		findById: id => Promise.resolve(roles.get(id)),
		findByName: name => Promise.resolve(byName(roles, name)),
		ensureRole: name =>
			Promise.resolve(
				byName(roles, name) ??
					createRole({ name, displayName: null, description: null, isPrivate: false, isEditable: true }),
			),
		upsertByName: role => {
			const existing = byName(roles, role.name);
			if (!existing) {
				return Promise.resolve(createRole(role));
			}
			const updated: Role = { ...existing, ...role, id: existing.id };
			roles.set(existing.id, updated);
			return Promise.resolve(updated);
		},
		create: role => Promise.resolve(createRole(role)),
		update: (id, updates) => {
			const role = roles.get(id);
			if (!role) {
				return Promise.resolve(undefined);
			}
			if (!role.isEditable) {
				return Promise.reject(new ForbiddenError(`Role ${role.name} cannot be modified`));
			}
			const updated: Role = { ...role, ...updates };
			roles.set(id, updated);
			return Promise.resolve(updated);
		},
		delete: id => {
			const role = roles.get(id);
			if (!role) {
				return Promise.resolve(false);
			}
			if (!role.isEditable) {
				return Promise.reject(new ForbiddenError(`Role ${role.name} cannot be deleted`));
			}
			roles.delete(id);
			rolePermissions.delete(id);
			for (const assigned of userRoles.values()) {
				assigned.delete(id);
			}
			return Promise.resolve(true);
		},
		getPermissions,
		getRoleWithPermissions: async id => {
			const role = roles.get(id);
			return role ? { ...role, permissions: await getPermissions(id) } : undefined;
		},
		syncPermissions: (roleId, permissionIds) => {
			rolePermissions.set(roleId, new Set(permissionIds));
			return Promise.resolve();
		},
		truncateAccessTables: () => {
			userRoles.clear();
			rolePermissions.clear();
			roles.clear();
			permissions.clear();
			return Promise.resolve();
		},
	};

	const permissionDao: PermissionDao = {
		listAll: () => Promise.resolve(sortByName([...permissions.values()])),
		findByName: name => Promise.resolve(byName(permissions, name)),
		findByNames: names => Promise.resolve(sortByName([...permissions.values()].filter(p => names.includes(p.name)))),
		upsertByName: permission => {
			const existing = byName(permissions, permission.name);
			const row: Permission = existing
				? { ...existing, ...permission, id: existing.id }
				: { id: ids.permission++, ...permission, createdAt: clock(), updatedAt: clock() };
			permissions.set(row.id, row);
			return Promise.resolve(row);
		},
		count: () => Promise.resolve(permissions.size),
	};

	const database: FakeTenantDatabase = {
		users,
		roles,
		permissions,
		rolePermissions,
		userRoles,
		migrated: false,
		userDao,
		roleDao,
		permissionDao,
		migrate: () => {
			database.migrated = true;
			return Promise.resolve();
		},
	};
	return database;

	function createRole(role: Omit<Role, "id" | "createdAt" | "updatedAt">): Role {
		const row: Role = { id: ids.role++, ...role, createdAt: clock(), updatedAt: clock() };
		roles.set(row.id, row);
		return row;
	}

	function getPermissions(roleId: number): Promise<Array<Permission>> {
		const attached = [...(rolePermissions.get(roleId) ?? [])].flatMap(id => permissions.get(id) ?? []);
		return Promise.resolve(sortByName(attached));
	}
}
