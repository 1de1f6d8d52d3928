import { readFile } from "node:fs/promises";
import type { RoleSeedConfig } from "storefront-common";
import { z } from "zod";

const RoleLabelSchema = z.object({
	displayName: z.string(),
	description: z.string().optional(),
});

export const RoleSeedConfigSchema = z.object({
	rolesStructure: z.record(z.record(z.string())),
	permissionsMap: z.record(z.string().min(1)),
	truncateTables: z.boolean().default(false),
	privateRoles: z.array(z.string()).default([]),
	notEditableRoles: z.array(z.string()).default([]),
	roleLabels: z.record(RoleLabelSchema).default({}),
	actionLabels: z.record(z.string()).default({}),
	moduleLabels: z.record(z.string()).default({}),
});

export const DEFAULT_ROLE_SEED_CONFIG_PATH = new URL("../../config/roles.json", import.meta.url);

export function parseRoleSeedConfig(value: unknown): RoleSeedConfig {
	return RoleSeedConfigSchema.parse(value);
}

/**
 * Reads and validates the role seed file. Defaults to backend/config/roles.json.
 */
export async function loadRoleSeedConfig(path: string | URL = DEFAULT_ROLE_SEED_CONFIG_PATH): Promise<RoleSeedConfig> {
	const contents = await readFile(path, "utf8");
	return parseRoleSeedConfig(JSON.parse(contents));
}
