import { getLog } from "../util/Logger";
import { requireTenantContext } from "./TenantContext";
import { TenantContextMismatchError } from "./TenantErrors";
import { permissionSlug, type RoleSeedConfig } from "storefront-common";

const log = getLog(import.meta);

export interface SeedRolesOptions {
	/** Refuse to run unless this tenant's context is the active one. */
	expectedTenantId?: string;
	/** Empty the access tables first. Defaults to the config's truncateTables. */
	truncate?: boolean;
}

export interface SkippedCode {
	role: string;
	module: string;
	code: string;
}

export interface SeedRolesResult {
	tenantId: string;
	truncated: boolean;
	/** Role name -> attached permission slugs, in seeding order */
	roles: Record<string, Array<string>>;
	skipped: Array<SkippedCode>;
}

function titleCase(value: string): string {
	return value
		.split("_")
		.filter(word => word.length > 0)
		.map(word => word.charAt(0).toUpperCase() + word.slice(1))
		.join(" ");
}

/** Reads a config entry, ignoring keys inherited from Object.prototype. */
function own<T>(record: Record<string, T>, key: string): T | undefined {
	return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Splits a comma-separated action code list, dropping blanks.
 */
export function parseActionCodes(value: string): Array<string> {
	return value
		.split(",")
		.map(code => code.trim())
		.filter(code => code.length > 0);
}

/**
 * Seeds roles and permissions into the active tenant's datastore.
 *
 * Roles are upserted by name and permissions by slug, and each role's
 * permission set is replaced rather than extended, so repeated runs converge
 * on the same rows. Unknown action codes are skipped with a warning.
 */
export async function seedRoles(config: RoleSeedConfig, options: SeedRolesOptions = {}): Promise<SeedRolesResult> {
	const context = requireTenantContext();
	const tenantId = context.tenant.id;
	if (options.expectedTenantId !== undefined && options.expectedTenantId !== tenantId) {
		throw new TenantContextMismatchError(tenantId, options.expectedTenantId);
	}

	const { roleDao, permissionDao } = context.database;
	const truncate = options.truncate ?? config.truncateTables;
	if (truncate) {
		log.info("Truncating access tables of %s before seeding", context.databaseName);
		await roleDao.truncateAccessTables();
	}

	const result: SeedRolesResult = { tenantId, truncated: truncate, roles: {}, skipped: [] };

	for (const [roleName, modules] of Object.entries(config.rolesStructure)) {
		const label = own(config.roleLabels, roleName);
		const role = await roleDao.upsertByName({
			name: roleName,
			displayName: label?.displayName ?? titleCase(roleName),
			description: label?.description ?? null,
			isPrivate: config.privateRoles.includes(roleName),
			isEditable: !config.notEditableRoles.includes(roleName),
		});
		log.info("Seeding role %s", roleName);

		const permissionIds: Array<number> = [];
		const slugs: Array<string> = [];
		for (const [module, codes] of Object.entries(modules)) {
			for (const code of parseActionCodes(codes)) {
				const action = own(config.permissionsMap, code);
				if (!action) {
					log.warn({ role: roleName, module, code }, "Unknown permission code '%s' in '%s', skipping", code, module);
					result.skipped.push({ role: roleName, module, code });
					continue;
				}
				const slug = permissionSlug(action, module);
				const actionLabel = own(config.actionLabels, action) ?? titleCase(action);
				const moduleLabel = own(config.moduleLabels, module) ?? titleCase(module);
				const permission = await permissionDao.upsertByName({
					name: slug,
					displayName: `${actionLabel} ${moduleLabel}`,
					description: null,
				});
				permissionIds.push(permission.id);
				slugs.push(slug);
			}
		}

		await roleDao.syncPermissions(role.id, permissionIds);
		result.roles[roleName] = [...new Set(slugs)];
		log.debug({ role: roleName, permissions: slugs.length }, "Attached permissions to %s", roleName);
	}

	log.info({ roles: Object.keys(result.roles).length, skipped: result.skipped.length }, "Role seeding finished");
	return result;
}
