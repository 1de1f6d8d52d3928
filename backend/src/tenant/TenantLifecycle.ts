/**
 * TenantLifecycle - creates, deletes and administers tenants.
 *
 * Creation runs these phases, in order:
 *
 * | phase     | where             | undo on failure                     |
 * |-----------|-------------------|-------------------------------------|
 * | register  | central, one tx   | the transaction rolls back          |
 * | provision | central server    | drop the datastore                  |
 * | migrate   | tenant context    | (dropped with the datastore)        |
 * | user      | tenant context    | (dropped with the datastore)        |
 * | seed      | tenant context    | (dropped with the datastore)        |
 * | activate  | central           | delete the tenant and domain rows   |
 *
 * A failure after `register` triggers cleanup of everything created so far and
 * surfaces as one ProvisioningFailedError. Until `activate` the tenant is
 * `pending`, and pending tenants are invisible to every read operation here.
 *
 * @module TenantLifecycle
 */

import type { CentralDatabase } from "../core/CentralDatabase";
import { AppError } from "../util/AppError";
import { getLog } from "../util/Logger";
import type { PasswordHasher } from "../util/PasswordUtil";
import { type SeedRolesResult, seedRoles } from "./RoleSeeder";
import type { TenantConnectionManager } from "./TenantConnectionManager";
import type { TenantContextManager } from "./TenantContextManager";
import type { TenantDatabaseProvisioner } from "./TenantDatabaseProvisioner";
import type { TenantDirectory } from "./TenantDirectory";
import { ProvisioningFailedError, TenantDeletionError, TenantNotFoundError } from "./TenantErrors";
import type { TenantResourceManager } from "./TenantResources";
import type { ManagedTenantStatus, RoleSeedConfig, Tenant, TenantSummary, UserInfo } from "storefront-common";

const log = getLog(import.meta);

export type ProvisioningPhase = "register" | "provision" | "migrate" | "user" | "seed" | "activate";

export type DeletionPhase = "domains" | "connection" | "database" | "resources" | "tenant";

export interface CreateTenantInput {
	tenant: { name: string; description: string | null };
	domain: string;
	user: { name: string; email: string; password: string };
}

export interface CreatedTenant {
	tenant: Tenant;
	user: UserInfo;
}

export interface TenantLifecycle {
	createTenant(input: CreateTenantInput): Promise<CreatedTenant>;
	/** Stops at the first failed phase with TenantDeletionError; safe to call again. */
	deleteTenant(tenantId: string): Promise<void>;
	updateTenantStatus(tenantId: string, status: ManagedTenantStatus): Promise<Tenant>;
	getTenant(tenantId: string): Promise<TenantSummary>;
	listTenants(): Promise<Array<TenantSummary>>;
	migrateTenant(tenantId: string): Promise<void>;
	reseedRoles(tenantId: string): Promise<SeedRolesResult>;
}

export interface TenantLifecycleDeps {
	central: CentralDatabase;
	directory: TenantDirectory;
	provisioner: TenantDatabaseProvisioner;
	connectionManager: TenantConnectionManager;
	contextManager: TenantContextManager;
	resourceManager: TenantResourceManager;
	passwordHasher: PasswordHasher;
	/** Role given to the first user of every tenant */
	ownerRole: string;
	/** Role seed source; seeding is skipped during provisioning when absent */
	loadRoleSeedConfig?: (() => Promise<RoleSeedConfig>) | undefined;
	/** Seed roles while provisioning (default: true). Reseeds ignore this. */
	seedOnProvision?: boolean | undefined;
	/** Status a tenant moves to once provisioned (default: active) */
	provisionedStatus?: ManagedTenantStatus;
}

export function createTenantLifecycle(deps: TenantLifecycleDeps): TenantLifecycle {
	const { central, directory, provisioner, connectionManager, contextManager, resourceManager } = deps;
	const provisionedStatus = deps.provisionedStatus ?? "active";

	return {
		createTenant,
		deleteTenant,
		updateTenantStatus,
		getTenant,
		listTenants,
		migrateTenant,
		reseedRoles,
	};

	function createTenant(input: CreateTenantInput): Promise<CreatedTenant> {
		// Central tables are never touched from inside another tenant's context
		return contextManager.runInCentralContext(() => provision(input));
	}

	async function provision(input: CreateTenantInput): Promise<CreatedTenant> {
		const pending = await register(input);
		const databaseName = connectionManager.databaseNameFor(pending.id);
		log.info({ tenantId: pending.id, domain: input.domain }, "Provisioning tenant %s", pending.id);

		let phase: ProvisioningPhase = "provision";
		try {
			await provisioner.createDatabase(databaseName);

			const user = await contextManager.runInTenantContext(pending.id, async ({ database }) => {
				phase = "migrate";
				await database.migrate();

				phase = "user";
				const passwordHash = await deps.passwordHasher.hash(input.user.password);
				const created = await database.userDao.create({
					name: input.user.name,
					email: input.user.email,
					passwordHash,
					status: "active",
				});
				const role = await database.roleDao.ensureRole(deps.ownerRole);
				await database.userDao.setRoles(created.id, [role.id]);

				if (deps.loadRoleSeedConfig && deps.seedOnProvision !== false) {
					phase = "seed";
					const config = await deps.loadRoleSeedConfig();
					// The owner already holds a role, so provisioning never truncates
					await seedRoles(config, { expectedTenantId: pending.id, truncate: false });
				}

				const info: UserInfo = {
					id: created.id,
					name: created.name,
					email: created.email,
					status: created.status,
					roles: [role.name],
				};
				return info;
			});

			phase = "activate";
			const tenant = await central.tenantDao.updateStatus(pending.id, provisionedStatus);
			if (!tenant) {
				throw new Error(`Tenant ${pending.id} disappeared before activation`);
			}

			log.info({ tenantId: tenant.id, status: tenant.status }, "Provisioned tenant %s", tenant.id);
			return { tenant, user };
		} catch (error) {
			log.error(
				{ err: error, tenantId: pending.id, phase },
				"Provisioning tenant %s failed at phase %s",
				pending.id,
				phase,
			);
			await rollback(pending.id, databaseName);
			throw new ProvisioningFailedError(phase, error);
		}
	}

	async function register(input: CreateTenantInput): Promise<Tenant> {
		try {
			return await central.transaction(async options => {
				const tenant = await central.tenantDao.create(
					{ name: input.tenant.name, description: input.tenant.description, status: "pending" },
					options,
				);
				await directory.registerDomain(input.domain, tenant.id, options);
				return tenant;
			});
		} catch (error) {
			if (error instanceof AppError) {
				throw error;
			}
			log.error({ err: error, phase: "register" }, "Registering tenant %s failed", input.domain);
			throw new ProvisioningFailedError("register", error);
		}
	}

	/** Undoes a failed provisioning. Every step runs; failures are logged, never thrown. */
	async function rollback(tenantId: string, databaseName: string): Promise<void> {
		log.warn({ tenantId }, "Rolling back tenant %s", tenantId);
		await cleanup("evict connection", tenantId, () => connectionManager.evictConnection(tenantId));
		await cleanup("drop datastore", tenantId, () => provisioner.dropDatabase(databaseName));
		await cleanup("delete records", tenantId, () =>
			central.transaction(async options => {
				await directory.removeDomains(tenantId, options);
				await central.tenantDao.delete(tenantId, options);
			}),
		);
	}

	async function cleanup(step: string, tenantId: string, action: () => Promise<unknown>): Promise<void> {
		try {
			await action();
		} catch (error) {
			log.error({ err: error, tenantId, step }, "Rollback step '%s' failed for tenant %s", step, tenantId);
		}
	}

	async function deleteTenant(tenantId: string): Promise<void> {
		const tenant = await central.tenantDao.findById(tenantId);
		if (!tenant) {
			throw new TenantNotFoundError(`Tenant ${tenantId} does not exist`);
		}
		const databaseName = connectionManager.databaseNameFor(tenantId);

		const phases: Array<[DeletionPhase, () => Promise<unknown>]> = [
			["domains", () => central.transaction(options => directory.removeDomains(tenantId, options))],
			["connection", () => connectionManager.evictConnection(tenantId)],
			["database", () => provisioner.dropDatabase(databaseName)],
			["resources", () => resourceManager.purge(tenantId, databaseName)],
			["tenant", () => central.tenantDao.delete(tenantId)],
		];

		for (const [phase, action] of phases) {
			try {
				await action();
			} catch (error) {
				log.error({ err: error, tenantId, phase }, "Deleting tenant %s failed at phase %s", tenantId, phase);
				throw new TenantDeletionError(tenantId, phase, error);
			}
		}
		log.info({ tenantId }, "Deleted tenant %s", tenantId);
	}

	async function findVisible(tenantId: string): Promise<Tenant> {
		const tenant = await central.tenantDao.findById(tenantId);
		if (!tenant || tenant.status === "pending") {
			throw new TenantNotFoundError(`Tenant ${tenantId} does not exist`);
		}
		return tenant;
	}

	async function updateTenantStatus(tenantId: string, status: ManagedTenantStatus): Promise<Tenant> {
		await findVisible(tenantId);
		const updated = await central.tenantDao.updateStatus(tenantId, status);
		if (!updated) {
			throw new TenantNotFoundError(`Tenant ${tenantId} does not exist`);
		}
		log.info({ tenantId, status }, "Tenant %s is now %s", tenantId, status);
		return updated;
	}

	async function summarize(tenant: Tenant): Promise<TenantSummary> {
		return { ...tenant, domains: await directory.listDomains(tenant.id) };
	}

	async function getTenant(tenantId: string): Promise<TenantSummary> {
		return summarize(await findVisible(tenantId));
	}

	async function listTenants(): Promise<Array<TenantSummary>> {
		const tenants = await central.tenantDao.listAll();
		return Promise.all(tenants.filter(tenant => tenant.status !== "pending").map(summarize));
	}

	async function migrateTenant(tenantId: string): Promise<void> {
		await findVisible(tenantId);
		await contextManager.runInCentralContext(() =>
			contextManager.runInTenantContext(tenantId, ({ database }) => database.migrate()),
		);
	}

	async function reseedRoles(tenantId: string): Promise<SeedRolesResult> {
		await findVisible(tenantId);
		if (!deps.loadRoleSeedConfig) {
			throw new Error("No role seed configuration is available");
		}
		const config = await deps.loadRoleSeedConfig();
		return contextManager.runInCentralContext(() =>
			contextManager.runInTenantContext(tenantId, () => seedRoles(config, { expectedTenantId: tenantId })),
		);
	}
}
