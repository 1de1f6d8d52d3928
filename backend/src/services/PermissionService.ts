import { requireDatabase } from "../tenant/TenantContext";

/**
 * Permission checks for users of the active tenant. Every method reads the
 * tenant datastore of the current tenant context.
 */
export class PermissionService {
	/**
	 * Check if a user has any of the specified permissions.
	 */
	async hasAnyPermission(userId: number, permissions: Array<string>): Promise<boolean> {
		const userPermissions = await this.getUserPermissions(userId);
		return permissions.some(p => userPermissions.includes(p));
	}

	/**
	 * Check if a user has all of the specified permissions.
	 */
	async hasAllPermissions(userId: number, permissions: Array<string>): Promise<boolean> {
		const userPermissions = await this.getUserPermissions(userId);
		return permissions.every(p => userPermissions.includes(p));
	}

	/**
	 * Get all permission names granted to a user through any of their roles,
	 * sorted and without duplicates.
	 */
	async getUserPermissions(userId: number): Promise<Array<string>> {
		const database = requireDatabase();
		const roles = await database.userDao.getRoles(userId);
		const names = new Set<string>();
		for (const role of roles) {
			for (const permission of await database.roleDao.getPermissions(role.id)) {
				names.add(permission.name);
			}
		}
		return [...names].sort();
	}
}
