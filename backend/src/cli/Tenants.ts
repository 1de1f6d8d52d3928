#!/usr/bin/env node

/**
 * Tenants - CLI entry point for tenant maintenance.
 *
 * A thin wrapper that calls runTenantCli() and exits with the returned code.
 * All logic is in TenantCommands.ts where it can be tested.
 *
 * ## Usage
 *
 * ```bash
 * # Run migrations for every active tenant
 * npx tsx src/cli/Tenants.ts migrate
 *
 * # Reseed roles for one tenant
 * npx tsx src/cli/Tenants.ts seed --tenant 3f2c...
 *
 * # Provision a store as the console platform
 * npx tsx src/cli/Tenants.ts create --name "Store One" --domain store1 \
 *   --email owner@example.com --password 'change-me-1!' \
 *   --description "Hand-thrown ceramics: mugs, bowls and planters made to order in our studio, shipped nationwide."
 * ```
 *
 * @module Tenants
 */

import { EXIT_CODES, runTenantCli } from "./TenantCommands";

runTenantCli()
	.then(result => {
		process.exit(result.exitCode);
	})
	.catch(error => {
		console.error("Unhandled error:", error);
		process.exit(EXIT_CODES.ERROR);
	});
