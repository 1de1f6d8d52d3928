/** Status of a tenant in the provisioning lifecycle */
export type TenantStatus = "pending" | "active" | "inactive" | "suspended";

export const TENANT_STATUSES: ReadonlyArray<TenantStatus> = ["pending", "active", "inactive", "suspended"];

/** Statuses an operator may move a provisioned tenant between. */
export type ManagedTenantStatus = Exclude<TenantStatus, "pending">;

/**
 * A merchant account. Each tenant owns exactly one isolated datastore whose
 * name is derived from the tenant id.
 */
export interface Tenant {
	id: string;
	name: string;
	description: string | null;
	status: TenantStatus;
	createdAt: Date;
	updatedAt: Date;
}

/** Data required to create a new tenant */
export interface NewTenant {
	name: string;
	description: string | null;
	status?: TenantStatus;
}

/** A hostname bound to exactly one tenant. */
export interface Domain {
	id: number;
	domain: string;
	tenantId: string;
	createdAt: Date;
	updatedAt: Date;
}

export interface NewDomain {
	domain: string;
	tenantId: string;
}

/** Tenant as reported to operators, with its bound domains. */
export interface TenantSummary extends Tenant {
	domains: Array<string>;
}
