import { defineRoles, type Role } from "../model/Role";
import { defineUsers, type NewUser, type User } from "../model/User";
import { defineUserRoles } from "../model/UserRole";
import type { Sequelize } from "sequelize";

export interface UserDao {
	create(user: NewUser): Promise<User>;
	findById(id: number): Promise<User | undefined>;
	findByEmail(email: string): Promise<User | undefined>;
	listAll(): Promise<Array<User>>;
	/** Replaces the user's role assignments with exactly the given ids. */
	setRoles(userId: number, roleIds: Array<number>): Promise<void>;
	getRoles(userId: number): Promise<Array<Role>>;
	count(): Promise<number>;
}

export function createUserDao(sequelize: Sequelize): UserDao {
	const Users = defineUsers(sequelize);
	const Roles = defineRoles(sequelize);
	const UserRoles = defineUserRoles(sequelize);

	return {
		create,
		findById,
		findByEmail,
		listAll,
		setRoles,
		getRoles,
		count,
	};

	async function create(user: NewUser): Promise<User> {
		const created = await Users.create(user);
		return created.get({ plain: true });
	}

	async function findById(id: number): Promise<User | undefined> {
		const user = await Users.findByPk(id);
		return user ? user.get({ plain: true }) : undefined;
	}

	async function findByEmail(email: string): Promise<User | undefined> {
		const user = await Users.findOne({ where: { email } });
		return user ? user.get({ plain: true }) : undefined;
	}

	async function listAll(): Promise<Array<User>> {
		const users = await Users.findAll({ order: [["id", "ASC"]] });
		return users.map(u => u.get({ plain: true }));
	}

	async function setRoles(userId: number, roleIds: Array<number>): Promise<void> {
		const unique = [...new Set(roleIds)];
		await sequelize.transaction(async transaction => {
			await UserRoles.destroy({ where: { userId }, transaction });
			if (unique.length > 0) {
				await UserRoles.bulkCreate(
					unique.map(roleId => ({ userId, roleId })),
					{ transaction },
				);
			}
		});
	}

	async function getRoles(userId: number): Promise<Array<Role>> {
		const links = await UserRoles.findAll({ where: { userId } });
		if (links.length === 0) {
			return [];
		}
		const roles = await Roles.findAll({
			where: { id: links.map(link => link.get({ plain: true }).roleId) },
			order: [["name", "ASC"]],
		});
		return roles.map(r => r.get({ plain: true }));
	}

	function count(): Promise<number> {
		return Users.count();
	}
}
