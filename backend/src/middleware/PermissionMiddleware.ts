import type { PermissionService } from "../services/PermissionService";
import { getTenantContext } from "../tenant/TenantContext";
import { ForbiddenError, UnauthorizedError } from "../util/AppError";
import { getLog } from "../util/Logger";
import { sendError } from "../util/RouterUtil";
import type { SessionClaims, TokenUtil } from "../util/TokenUtil";
import type { NextFunction, Request, RequestHandler, Response } from "express";

const log = getLog(import.meta);

const sessions = new WeakMap<Request, SessionClaims>();

/**
 * Dependencies for permission middleware.
 */
export interface PermissionMiddlewareDependencies {
	tokenUtil: TokenUtil<SessionClaims>;
	permissionService: PermissionService;
}

export type PermissionMiddlewareFactory = ReturnType<typeof createPermissionMiddleware>;

/**
 * The session established for this request by requireAuth or requirePermission.
 * @throws UnauthorizedError when neither ran
 */
export function getSession(req: Request): SessionClaims {
	const session = sessions.get(req);
	if (!session) {
		throw new UnauthorizedError();
	}
	return session;
}

/**
 * Create permission middleware factory. Must be mounted behind the tenant
 * middleware: a token only opens the tenant it was issued for.
 */
export function createPermissionMiddleware(deps: PermissionMiddlewareDependencies) {
	const { tokenUtil, permissionService } = deps;

	function authenticate(req: Request): SessionClaims {
		const existing = sessions.get(req);
		if (existing) {
			return existing;
		}
		const claims = tokenUtil.decodePayload(req);
		if (!claims) {
			throw new UnauthorizedError();
		}
		const tenantId = getTenantContext()?.tenant.id;
		if (claims.tenantId !== tenantId) {
			log.warn("Token for tenant %s presented to tenant %s", claims.tenantId, tenantId ?? "none");
			throw new UnauthorizedError("Token was not issued for this store");
		}
		sessions.set(req, claims);
		return claims;
	}

	/**
	 * Middleware to require a valid token for the current tenant.
	 */
	function requireAuth(): RequestHandler {
		return (req: Request, res: Response, next: NextFunction) => {
			try {
				authenticate(req);
			} catch (error) {
				sendError(res, error);
				return;
			}
			next();
		};
	}

	/**
	 * Middleware to require any of the specified permissions.
	 *
	 * @param permissions - Permission slugs to check (e.g., "read-roles")
	 */
	function requirePermission(...permissions: Array<string>): RequestHandler {
		return async (req: Request, res: Response, next: NextFunction) => {
			try {
				const session = authenticate(req);
				const allowed = await permissionService.hasAnyPermission(session.userId, permissions);
				log.debug(
					"Permission check: %s %s requires [%s] -> %s",
					req.method,
					req.originalUrl,
					permissions.join(", "),
					allowed ? "ALLOWED" : "DENIED",
				);
				if (!allowed) {
					throw new ForbiddenError("You do not have permission to perform this action");
				}
			} catch (error) {
				sendError(res, error);
				return;
			}
			next();
		};
	}

	return { requireAuth, requirePermission };
}
