import { getLog } from "../util/Logger";
import { sendError } from "../util/RouterUtil";
import { getRequestHost } from "./DomainUtils";
import type { TenantContextManager } from "./TenantContextManager";
import type { TenantDirectory } from "./TenantDirectory";
import { TenantInactiveError, TenantNotFoundError } from "./TenantErrors";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Tenant } from "storefront-common";

const log = getLog(import.meta);

/**
 * Configuration for tenant middleware.
 */
export interface TenantMiddlewareConfig {
	directory: TenantDirectory;
	contextManager: TenantContextManager;
}

/**
 * Creates Express middleware that resolves the tenant from the request host
 * and runs the rest of the request inside that tenant's context, until the
 * response has finished.
 *
 * Error responses:
 * - 404: no tenant is registered for the host
 * - 403: the tenant is not active
 */
export function createTenantMiddleware(config: TenantMiddlewareConfig): RequestHandler {
	const { directory, contextManager } = config;

	return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
		let tenant: Tenant;
		try {
			tenant = await resolveActiveTenant(directory, getRequestHost(req));
		} catch (error) {
			sendError(res, error);
			return;
		}

		try {
			await contextManager.runInTenantContext(
				tenant.id,
				() =>
					new Promise<void>(resolve => {
						res.once("finish", resolve);
						res.once("close", resolve);
						next();
					}),
			);
		} catch (error) {
			if (res.headersSent) {
				log.error(error, "Tenant context failed after the response started");
				return;
			}
			sendError(res, error);
		}
	};
}

async function resolveActiveTenant(directory: TenantDirectory, host: string | undefined): Promise<Tenant> {
	const tenant = host ? await directory.findTenantByDomain(host) : undefined;
	if (!tenant) {
		log.debug("No tenant for host %s", host ?? "(none)");
		throw new TenantNotFoundError("Store not found");
	}
	if (tenant.status !== "active") {
		log.warn("Tenant not active: %s (status: %s)", tenant.id, tenant.status);
		throw new TenantInactiveError();
	}
	return tenant;
}
