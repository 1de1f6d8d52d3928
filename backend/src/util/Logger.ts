import { getTenantContext } from "../tenant/TenantContext";
import { createLog, type Logger } from "storefront-common";

/**
 * Adds the active tenant to every log line written inside a tenant context.
 */
function tenantMixin(): Record<string, unknown> {
	const context = getTenantContext();
	return context ? { tenantId: context.tenant.id } : {};
}

/**
 * Get a logger for the specified module. Call `getLog(import.meta)` near the
 * top of the file, after imports; the module name is derived from the file name.
 */
export function getLog(module: string | ImportMeta): Logger {
	return createLog(module, { mixin: tenantMixin });
}
