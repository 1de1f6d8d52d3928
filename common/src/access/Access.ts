export type UserStatus = "inactive" | "active" | "pending" | "suspended";

/** A user of one tenant. Never carries the password hash. */
export interface UserInfo {
	id: number;
	name: string;
	email: string;
	status: UserStatus;
	roles: Array<string>;
}

export interface RoleInfo {
	id: number;
	name: string;
	displayName: string | null;
	description: string | null;
	isEditable: boolean;
	permissions: Array<string>;
}

export interface RoleLabel {
	displayName: string;
	description?: string;
}

/**
 * Declarative role structure seeded into every tenant.
 *
 * `rolesStructure` maps a role name to modules, and each module to a
 * comma-separated list of action codes resolved through `permissionsMap`,
 * e.g. `{ merchant_admin: { users: "c,r,u,d" } }`.
 */
export interface RoleSeedConfig {
	rolesStructure: Record<string, Record<string, string>>;
	permissionsMap: Record<string, string>;
	truncateTables: boolean;
	privateRoles: Array<string>;
	notEditableRoles: Array<string>;
	roleLabels: Record<string, RoleLabel>;
	actionLabels: Record<string, string>;
	moduleLabels: Record<string, string>;
}

/** Permission slug for an action on a module, e.g. `create-users`. */
export function permissionSlug(action: string, module: string): string {
	return `${action}-${module}`;
}
