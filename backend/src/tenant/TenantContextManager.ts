/**
 * TenantContextManager - runs units of work against one tenant's isolated
 * resources.
 *
 * A unit of work moves through `central -> switching -> active -> restoring ->
 * central`. The active context lives in AsyncLocalStorage, so it is scoped to
 * the async call tree of the unit of work: when the work settles, by return or
 * by throw, the caller is back in whatever context it had before.
 *
 * Entering the context of a second tenant from inside the first is refused
 * with NestedContextError; re-entering the same tenant reuses the active
 * context.
 *
 * @module TenantContextManager
 */

import type { TenantDao } from "../dao/TenantDao";
import { getLog } from "../util/Logger";
import type { TenantConnectionManager } from "./TenantConnectionManager";
import {
	createTenantContext,
	getTenantContext,
	runWithoutTenantContext,
	runWithTenantContext,
	type TenantContext,
} from "./TenantContext";
import { NestedContextError, TenantNotFoundError } from "./TenantErrors";
import type { TenantResourceManager } from "./TenantResources";

const log = getLog(import.meta);

export type TenantWork<T> = (context: TenantContext) => Promise<T> | T;

export interface TenantContextManager {
	runInTenantContext<T>(tenantId: string, work: TenantWork<T>): Promise<T>;
	/** Runs work with no tenant active, even when called from inside a tenant context. */
	runInCentralContext<T>(work: () => Promise<T> | T): Promise<T>;
	getCurrentTenantId(): string | undefined;
}

export interface TenantContextManagerDeps {
	tenantDao: TenantDao;
	connectionManager: TenantConnectionManager;
	resourceManager: TenantResourceManager;
}

export function createTenantContextManager(deps: TenantContextManagerDeps): TenantContextManager {
	const { tenantDao, connectionManager, resourceManager } = deps;

	return {
		runInTenantContext,
		runInCentralContext,
		getCurrentTenantId,
	};

	async function runInTenantContext<T>(tenantId: string, work: TenantWork<T>): Promise<T> {
		const current = getTenantContext();
		if (current) {
			if (current.tenant.id === tenantId) {
				return work(current);
			}
			throw new NestedContextError(current.tenant.id, tenantId);
		}

		log.debug({ tenantId, state: "switching" }, "Switching to tenant %s", tenantId);
		const context = await openContext(tenantId);

		try {
			return await runWithTenantContext(context, () => {
				log.debug({ state: "active", databaseName: context.databaseName }, "Tenant context active");
				return work(context);
			});
		} finally {
			log.debug({ tenantId, state: "restoring" }, "Leaving tenant %s", tenantId);
			log.debug({ state: "central" }, "Central context restored");
		}
	}

	async function openContext(tenantId: string): Promise<TenantContext> {
		const tenant = await tenantDao.findById(tenantId);
		if (!tenant) {
			throw new TenantNotFoundError(`Tenant ${tenantId} does not exist`);
		}
		const databaseName = connectionManager.databaseNameFor(tenantId);
		const database = await connectionManager.getConnection(tenantId);
		return createTenantContext(tenant, databaseName, database, resourceManager.forTenant(tenantId, databaseName));
	}

	function runInCentralContext<T>(work: () => Promise<T> | T): Promise<T> {
		return runWithoutTenantContext(async () => work());
	}

	function getCurrentTenantId(): string | undefined {
		return getTenantContext()?.tenant.id;
	}
}
