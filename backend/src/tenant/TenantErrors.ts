import { AppError } from "../util/AppError";

export class DuplicateDomainError extends AppError {
	readonly domain: string;

	constructor(domain: string) {
		super("client", 409, "duplicate_domain", `The domain ${domain} has already been taken`);
		this.name = "DuplicateDomainError";
		this.domain = domain;
	}
}

export class TenantNotFoundError extends AppError {
	constructor(message = "Tenant not found") {
		super("not_found", 404, "tenant_not_found", message);
		this.name = "TenantNotFoundError";
	}
}

export class TenantInactiveError extends AppError {
	constructor() {
		super("forbidden", 403, "tenant_inactive", "Tenant is not active");
		this.name = "TenantInactiveError";
	}
}

/**
 * Tenant creation failed and was rolled back. The message is deliberately
 * generic; the failed phase and root cause are in `phase` and `cause`.
 */
export class ProvisioningFailedError extends AppError {
	readonly phase: string;

	constructor(phase: string, cause: unknown) {
		super("provisioning", 500, "provisioning_failed", "Something went wrong while creating the store", { cause });
		this.name = "ProvisioningFailedError";
		this.phase = phase;
	}
}

export class TenantDeletionError extends AppError {
	readonly tenantId: string;
	readonly phase: string;

	constructor(tenantId: string, phase: string, cause: unknown) {
		super("provisioning", 500, "tenant_deletion_failed", `Tenant deletion stopped at phase "${phase}"`, { cause });
		this.name = "TenantDeletionError";
		this.tenantId = tenantId;
		this.phase = phase;
	}
}

/** Entering a tenant context while another tenant's context is active. */
export class NestedContextError extends AppError {
	readonly activeTenantId: string;
	readonly requestedTenantId: string;

	constructor(activeTenantId: string, requestedTenantId: string) {
		super(
			"context",
			500,
			"nested_context",
			`Cannot enter tenant ${requestedTenantId} while tenant ${activeTenantId} is active`,
		);
		this.name = "NestedContextError";
		this.activeTenantId = activeTenantId;
		this.requestedTenantId = requestedTenantId;
	}
}

export class TenantContextMissingError extends AppError {
	constructor() {
		super("context", 500, "tenant_context_missing", "No tenant context is active");
		this.name = "TenantContextMissingError";
	}
}

export class TenantContextMismatchError extends AppError {
	constructor(activeTenantId: string, expectedTenantId: string) {
		super(
			"context",
			500,
			"tenant_context_mismatch",
			`Expected tenant ${expectedTenantId} but tenant ${activeTenantId} is active`,
		);
		this.name = "TenantContextMismatchError";
	}
}
