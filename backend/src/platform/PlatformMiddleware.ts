import { sendError } from "../util/RouterUtil";
import type { PlatformDetector } from "./PlatformDetector";
import type { PlatformRegistry } from "./PlatformRegistry";
import { PlatformScope } from "./PlatformScope";
import type { NextFunction, Request, RequestHandler, Response } from "express";

const scopes = new WeakMap<Request, PlatformScope>();

export interface PlatformMiddlewareConfig {
	detector: PlatformDetector;
	registry: PlatformRegistry;
}

/**
 * Resolves the request's (version, platform) pair and attaches a fresh
 * PlatformScope to it. Detection failures end the request.
 */
export function createPlatformMiddleware(config: PlatformMiddlewareConfig): RequestHandler {
	const { detector, registry } = config;

	return (req: Request, res: Response, next: NextFunction): void => {
		try {
			const resolved = detector.detect({ path: req.originalUrl, headers: req.headers });
			scopes.set(req, new PlatformScope(registry, resolved));
		} catch (error) {
			sendError(res, error);
			return;
		}
		next();
	};
}

/**
 * The scope created for this request by the platform middleware.
 * @throws Error when the middleware did not run for the request
 */
export function getPlatformScope(req: Request): PlatformScope {
	const scope = scopes.get(req);
	if (!scope) {
		throw new Error(`No platform scope for ${req.method} ${req.originalUrl}`);
	}
	return scope;
}

/** Scope for console and background work, bound to the detector's fallback. */
export function createConsoleScope(config: PlatformMiddlewareConfig): PlatformScope {
	return new PlatformScope(config.registry, config.detector.detect(undefined));
}
