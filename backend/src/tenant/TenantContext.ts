import type { TenantDatabase } from "../core/TenantDatabase";
import { TenantContextMissingError } from "./TenantErrors";
import type { TenantResources } from "./TenantResources";
import { AsyncLocalStorage } from "node:async_hooks";
import type { Tenant } from "storefront-common";

/**
 * Everything a unit of work needs to operate on one tenant's isolated
 * resources. Stored in AsyncLocalStorage, so each request or job carries its
 * own context and concurrent units of work never observe each other's.
 */
export interface TenantContext {
	readonly tenant: Tenant;
	/** Schema or database name of the tenant's datastore */
	readonly databaseName: string;
	readonly database: TenantDatabase;
	readonly resources: TenantResources;
}

const tenantContextStorage = new AsyncLocalStorage<TenantContext>();

/**
 * Get the current tenant context, or undefined in the central context.
 */
export function getTenantContext(): TenantContext | undefined {
	return tenantContextStorage.getStore();
}

export function requireTenantContext(): TenantContext {
	const context = tenantContextStorage.getStore();
	if (!context) {
		throw new TenantContextMissingError();
	}
	return context;
}

/**
 * Shorthand for requireTenantContext().database
 */
export function requireDatabase(): TenantDatabase {
	return requireTenantContext().database;
}

/**
 * Runs fn with the given context active. Callers should go through the
 * TenantContextManager, which enforces the no-nesting rule.
 */
export function runWithTenantContext<T>(context: TenantContext, fn: () => T): T {
	return tenantContextStorage.run(context, fn);
}

/**
 * Runs fn with no tenant context active.
 */
export function runWithoutTenantContext<T>(fn: () => T): T {
	return tenantContextStorage.exit(fn);
}

export function createTenantContext(
	tenant: Tenant,
	databaseName: string,
	database: TenantDatabase,
	resources: TenantResources,
): TenantContext {
	return { tenant, databaseName, database, resources };
}
