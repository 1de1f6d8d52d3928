import { definePermissions, type NewPermission, type Permission } from "../model/Permission";
import type { Sequelize } from "sequelize";

export interface PermissionDao {
	listAll(): Promise<Array<Permission>>;
	findByName(name: string): Promise<Permission | undefined>;
	findByNames(names: Array<string>): Promise<Array<Permission>>;
	/** Creates the permission, or updates its labels when the name exists. */
	upsertByName(permission: NewPermission): Promise<Permission>;
	count(): Promise<number>;
}

export function createPermissionDao(sequelize: Sequelize): PermissionDao {
	const Permissions = definePermissions(sequelize);

	return {
		listAll,
		findByName,
		findByNames,
		upsertByName,
		count,
	};

	async function listAll(): Promise<Array<Permission>> {
		const permissions = await Permissions.findAll({ order: [["name", "ASC"]] });
		return permissions.map(p => p.get({ plain: true }));
	}

	async function findByName(name: string): Promise<Permission | undefined> {
		const permission = await Permissions.findOne({ where: { name } });
		return permission ? permission.get({ plain: true }) : undefined;
	}

	async function findByNames(names: Array<string>): Promise<Array<Permission>> {
		if (names.length === 0) {
			return [];
		}
		const permissions = await Permissions.findAll({ where: { name: names }, order: [["name", "ASC"]] });
		return permissions.map(p => p.get({ plain: true }));
	}

	async function upsertByName(permission: NewPermission): Promise<Permission> {
		const existing = await Permissions.findOne({ where: { name: permission.name } });
		if (!existing) {
			const created = await Permissions.create(permission);
			return created.get({ plain: true });
		}
		const current = existing.get({ plain: true });
		if (current.displayName === permission.displayName && current.description === permission.description) {
			return current;
		}
		const labels = { displayName: permission.displayName, description: permission.description };
		await Permissions.update(labels, { where: { id: current.id } });
		return { ...current, ...labels };
	}

	function count(): Promise<number> {
		return Permissions.count();
	}
}
