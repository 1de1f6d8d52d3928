import type { User } from "../model/User";
import { type BindingScope, defineContract } from "../platform/PlatformRegistry";
import { requireTenantContext } from "../tenant/TenantContext";
import type { TenantDirectory } from "../tenant/TenantDirectory";
import { DuplicateDomainError } from "../tenant/TenantErrors";
import type { TenantLifecycle } from "../tenant/TenantLifecycle";
import { ForbiddenError, InvalidCredentialsError } from "../util/AppError";
import { getLog } from "../util/Logger";
import type { PasswordHasher } from "../util/PasswordUtil";
import type { SessionClaims, TokenUtil } from "../util/TokenUtil";
import { SignInRequest, SignUpRequest } from "./AuthRequests";
import type { ResolvedPlatform, Tenant, UserInfo } from "storefront-common";

const log = getLog(import.meta);

export interface SignUpResult {
	tenant: Tenant;
	user: UserInfo;
}

export interface SignInResult {
	token: string;
	/** Token lifetime in seconds */
	expiresIn: number;
	user: UserInfo;
}

/**
 * Merchant authentication. Sign-up runs in the central context and creates a
 * tenant; sign-in runs inside the tenant context of the requested store.
 */
export interface AuthService {
	signUp(body: unknown): Promise<SignUpResult>;
	signIn(body: unknown): Promise<SignInResult>;
	whatIsMyPlatform(): ResolvedPlatform;
}

export const AuthService = defineContract<AuthService>("AuthService");

export interface AuthServiceDeps {
	directory: TenantDirectory;
	lifecycle: TenantLifecycle;
	passwordHasher: PasswordHasher;
	tokenUtil: TokenUtil<SessionClaims>;
	tokenExpiresInSeconds: number;
}

export function toUserInfo(user: User, roles: Array<string>): UserInfo {
	return { id: user.id, name: user.name, email: user.email, status: user.status, roles };
}

/**
 * Auth service for one request scope. The request contracts it binds decide
 * the platform-specific validation rules.
 */
export function createAuthService(scope: BindingScope, deps: AuthServiceDeps): AuthService {
	const { directory, lifecycle, passwordHasher, tokenUtil } = deps;

	return { signUp, signIn, whatIsMyPlatform };

	async function signUp(body: unknown): Promise<SignUpResult> {
		const input = scope.bind(SignUpRequest).parse(body);

		if (!(await directory.isDomainUnique(input.merchantDomain))) {
			throw new DuplicateDomainError(input.merchantDomain);
		}

		const created = await lifecycle.createTenant({
			tenant: { name: input.merchantName, description: input.merchantDescription },
			domain: input.merchantDomain,
			user: { name: input.name, email: input.email, password: input.password },
		});
		log.info(
			{ tenantId: created.tenant.id, domain: input.merchantDomain, platform: scope.platform },
			"Merchant %s signed up",
			input.merchantName,
		);
		return created;
	}

	async function signIn(body: unknown): Promise<SignInResult> {
		const input = scope.bind(SignInRequest).parse(body);
		const { tenant, database } = requireTenantContext();

		const user = await database.userDao.findByEmail(input.email);
		if (!user || !(await passwordHasher.verify(user.passwordHash, input.password))) {
			log.debug("Failed sign-in for %s", input.email);
			throw new InvalidCredentialsError();
		}
		if (user.status !== "active") {
			throw new ForbiddenError("Account is not active");
		}

		const roles = await database.userDao.getRoles(user.id);
		const token = tokenUtil.generateToken({
			userId: user.id,
			email: user.email,
			tenantId: tenant.id,
			platform: scope.platform,
		});
		return {
			token,
			expiresIn: deps.tokenExpiresInSeconds,
			user: toUserInfo(user, roles.map(role => role.name)),
		};
	}

	function whatIsMyPlatform(): ResolvedPlatform {
		return { version: scope.version, platform: scope.platform };
	}
}
