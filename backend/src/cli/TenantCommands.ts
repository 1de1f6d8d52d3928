/**
 * TenantCommands - operator commands run against every active tenant or one.
 *
 * The CLI runner in Tenants.ts uses these functions.
 *
 * @module TenantCommands
 */

import { createPlatformLayer } from "../AppFactory";
import { initializeConfig } from "../config/Config";
import { createConsoleScope } from "../platform/PlatformMiddleware";
import type { BindingScope } from "../platform/PlatformRegistry";
import { AuthService } from "../services/AuthService";
import { createTenancyFromConfig } from "../tenant/MultiTenantSetup";
import type { TenantLifecycle } from "../tenant/TenantLifecycle";
import { AppError, ValidationError } from "../util/AppError";

export type TenantCommand =
	| { kind: "migrate"; tenantId?: string | undefined }
	| { kind: "seed"; tenantId?: string | undefined }
	| {
			kind: "create";
			name: string;
			domain: string;
			email: string;
			password: string;
			/** Web sign-ups require at least 100 characters */
			description: string;
			ownerName?: string | undefined;
	  };

export interface ParseArgsResult {
	command?: TenantCommand;
	validationError?: string;
}

/**
 * Result of running a command against one tenant.
 */
export interface TenantCommandResult {
	tenantId: string;
	status: "success" | "failed";
	error?: string;
	durationMs: number;
}

export interface CommandSummary {
	succeeded: number;
	failed: number;
	results: Array<TenantCommandResult>;
}

/**
 * Logger interface for CLI output.
 */
export interface CliLogger {
	info(message: string): void;
	error(message: string): void;
}

export interface TenantCliContext {
	lifecycle: TenantLifecycle;
	/** Scope bound to the console fallback version and platform */
	consoleScope: BindingScope;
}

export interface OpenedCliContext {
	context: TenantCliContext;
	close(): Promise<void>;
}

export const EXIT_CODES = {
	SUCCESS: 0,
	/** At least one tenant failed, or the command could not run */
	ERROR: 1,
	/** Unknown command or missing flags */
	USAGE: 2,
} as const;

export const USAGE = [
	"Usage:",
	"  tenants migrate [--tenant <id>]",
	"  tenants seed [--tenant <id>]",
	"  tenants create --name <store> --domain <subdomain> --email <email> --password <password>",
	"                 --description <text> [--owner-name <name>]",
	"",
	"For create, only the first label of --domain is kept; the store is served at {label}.{BASE_DOMAIN}.",
].join("\n");

/* v8 ignore start */
export function createConsoleLogger(): CliLogger {
	return {
		info: message => console.log(message),
		error: message => console.error(message),
	};
}
/* v8 ignore stop */

function readFlags(args: Array<string>): { flags: Map<string, string>; error?: string } {
	const flags = new Map<string, string>();
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (!arg?.startsWith("--")) {
			return { flags, error: `Unexpected argument: ${arg ?? ""}` };
		}
		const value = args[i + 1];
		if (value === undefined || value.startsWith("--")) {
			return { flags, error: `Missing value for ${arg}` };
		}
		flags.set(arg.slice(2), value);
		i++;
	}
	return { flags };
}

/**
 * Parse command line arguments into a command.
 */
export function parseArgs(args: Array<string>): ParseArgsResult {
	const [name, ...rest] = args;
	const { flags, error } = readFlags(rest);
	if (error) {
		return { validationError: error };
	}

	switch (name) {
		case "migrate":
		case "seed": {
			const unknown = [...flags.keys()].filter(flag => flag !== "tenant");
			if (unknown.length > 0) {
				return { validationError: `Unknown option: --${unknown.join(", --")}` };
			}
			return { command: { kind: name, tenantId: flags.get("tenant") } };
		}
		case "create": {
			const required = ["name", "domain", "email", "password", "description"];
			const missing = required.filter(flag => !flags.has(flag));
			if (missing.length > 0) {
				return { validationError: `Missing required option(s): --${missing.join(", --")}` };
			}
			return {
				command: {
					kind: "create",
					name: flags.get("name") ?? "",
					domain: flags.get("domain") ?? "",
					email: flags.get("email") ?? "",
					password: flags.get("password") ?? "",
					description: flags.get("description") ?? "",
					ownerName: flags.get("owner-name"),
				},
			};
		}
		default:
			return { validationError: name ? `Unknown command: ${name}` : "No command given" };
	}
}

async function targetTenants(lifecycle: TenantLifecycle, tenantId: string | undefined): Promise<Array<string>> {
	if (tenantId) {
		return [tenantId];
	}
	const tenants = await lifecycle.listTenants();
	return tenants.filter(tenant => tenant.status === "active").map(tenant => tenant.id);
}

function describeError(error: unknown): string {
	if (error instanceof ValidationError) {
		return error.issues.map(issue => `${issue.field}: ${issue.message}`).join("; ");
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Runs `action` for each tenant in turn. One tenant failing does not stop
 * the others.
 */
export async function forEachTenant(
	tenantIds: Array<string>,
	action: (tenantId: string) => Promise<string | undefined>,
	logger: CliLogger,
	now: () => number = Date.now,
): Promise<CommandSummary> {
	const summary: CommandSummary = { succeeded: 0, failed: 0, results: [] };
	for (const tenantId of tenantIds) {
		const started = now();
		try {
			const detail = await action(tenantId);
			summary.succeeded++;
			summary.results.push({ tenantId, status: "success", durationMs: now() - started });
			logger.info(`[OK] ${tenantId}${detail ? ` ${detail}` : ""}`);
		} catch (error) {
			const message = describeError(error);
			summary.failed++;
			summary.results.push({ tenantId, status: "failed", error: message, durationMs: now() - started });
			logger.error(`[FAILED] ${tenantId}: ${message}`);
		}
	}
	return summary;
}

/**
 * Runs one command and returns the exit code.
 */
export async function runTenantCommand(
	command: TenantCommand,
	context: TenantCliContext,
	logger: CliLogger,
): Promise<number> {
	const { lifecycle } = context;

	if (command.kind === "create") {
		try {
			const { tenant, user } = await context.consoleScope.bind(AuthService).signUp({
				name: command.ownerName ?? command.name,
				email: command.email,
				password: command.password,
				merchant_name: command.name,
				merchant_description: command.description,
				merchant_subdomain: command.domain,
			});
			logger.info(`Created tenant ${tenant.id} (${tenant.status}) with owner ${user.email}`);
			return EXIT_CODES.SUCCESS;
		} catch (error) {
			logger.error(`Could not create tenant: ${describeError(error)}`);
			return error instanceof AppError && error.kind === "client" ? EXIT_CODES.USAGE : EXIT_CODES.ERROR;
		}
	}

	const tenantIds = await targetTenants(lifecycle, command.tenantId);
	logger.info(`Running ${command.kind} for ${tenantIds.length} tenant(s)`);

	const summary =
		command.kind === "migrate"
			? await forEachTenant(
					tenantIds,
					async tenantId => {
						await lifecycle.migrateTenant(tenantId);
						return undefined;
					},
					logger,
				)
			: await forEachTenant(
					tenantIds,
					async tenantId => {
						const result = await lifecycle.reseedRoles(tenantId);
						const skipped = result.skipped.length > 0 ? `, ${result.skipped.length} code(s) skipped` : "";
						return `${Object.keys(result.roles).length} role(s)${result.truncated ? ", truncated" : ""}${skipped}`;
					},
					logger,
				);

	logger.info(`Done: ${summary.succeeded} succeeded, ${summary.failed} failed`);
	return summary.failed > 0 ? EXIT_CODES.ERROR : EXIT_CODES.SUCCESS;
}

/* v8 ignore start */
/** Opens the datastores named in the configuration. */
export async function openCliContext(): Promise<OpenedCliContext> {
	const config = initializeConfig();
	const tenancy = await createTenancyFromConfig(config);
	const layer = createPlatformLayer(config, tenancy);
	return {
		context: { lifecycle: tenancy.lifecycle, consoleScope: createConsoleScope(layer) },
		close: tenancy.shutdown,
	};
}
/* v8 ignore stop */

/**
 * Run the CLI with the given arguments. Returns an exit code instead of
 * calling process.exit() directly.
 */
export async function runTenantCli(
	args: Array<string> = process.argv.slice(2),
	open: () => Promise<OpenedCliContext> = openCliContext,
	logger: CliLogger = createConsoleLogger(),
): Promise<{ exitCode: number }> {
	const { command, validationError } = parseArgs(args);
	if (!command) {
		logger.error(`Error: ${validationError ?? "No command given"}\n\n${USAGE}`);
		return { exitCode: EXIT_CODES.USAGE };
	}

	const opened = await open();
	try {
		return { exitCode: await runTenantCommand(command, opened.context, logger) };
	} catch (error) {
		logger.error(`Command failed: ${describeError(error)}`);
		return { exitCode: EXIT_CODES.ERROR };
	} finally {
		await opened.close();
	}
}
