import {
	createMobileSignUpRequest,
	createSignInRequest,
	createWebSignUpRequest,
	SignInRequest,
	SignUpRequest,
} from "../services/AuthRequests";
import { AuthService, type AuthServiceDeps, createAuthService } from "../services/AuthService";
import { createRoleRequest, createRoleService, RoleRequest, RoleService, type RoleServiceDeps } from "../services/RoleService";
import { PlatformRegistry } from "./PlatformRegistry";

export interface BindingDeps extends AuthServiceDeps, RoleServiceDeps {
	/** Merchant domains are `{subdomain}.{baseDomain}` */
	baseDomain: string;
}

/**
 * The application's binding table. Adding a platform means adding its
 * implementations here.
 */
export function createPlatformRegistry(versions: ReadonlyArray<string>, deps: BindingDeps): PlatformRegistry {
	return new PlatformRegistry()
		.registerAll(versions, SignUpRequest, {
			implementation: "WebSignUpRequest",
			platform: "web",
			create: () => createWebSignUpRequest(deps.baseDomain),
		})
		.registerAll(versions, SignUpRequest, {
			implementation: "MobileSignUpRequest",
			platform: "mobile",
			create: () => createMobileSignUpRequest(deps.baseDomain),
		})
		.registerAll(versions, SignInRequest, {
			implementation: "WebSignInRequest",
			platform: "web",
			create: createSignInRequest,
		})
		.registerAll(versions, SignInRequest, {
			implementation: "MobileSignInRequest",
			platform: "mobile",
			create: createSignInRequest,
		})
		.registerAll(versions, AuthService, {
			implementation: "WebAuthService",
			platform: "web",
			create: scope => createAuthService(scope, deps),
		})
		.registerAll(versions, AuthService, {
			implementation: "MobileAuthService",
			platform: "mobile",
			create: scope => createAuthService(scope, deps),
		})
		.registerAll(versions, RoleRequest, {
			implementation: "WebRoleRequest",
			platform: "web",
			create: createRoleRequest,
		})
		.registerAll(versions, RoleService, {
			implementation: "WebRoleService",
			platform: "web",
			create: scope => createRoleService(scope, deps),
		});
}
