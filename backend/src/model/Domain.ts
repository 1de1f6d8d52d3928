import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";
import type { Domain, NewDomain } from "storefront-common";

/**
 * Define the Domain model (central database). `domain` is globally unique.
 */
export function defineDomains(sequelize: Sequelize): ModelDef<Domain, NewDomain> {
	const existing = sequelize.models?.domain;
	if (existing) {
		return existing;
	}
	return sequelize.define("domain", schema, {
		timestamps: true,
		underscored: true,
		tableName: "domains",
	});
}

const schema = {
	id: {
		type: DataTypes.INTEGER,
		autoIncrement: true,
		primaryKey: true,
	},
	domain: {
		type: DataTypes.STRING(255),
		allowNull: false,
		unique: "domains_domain_key",
	},
	tenantId: {
		type: DataTypes.UUID,
		allowNull: false,
		references: {
			model: "tenants",
			key: "id",
		},
		onDelete: "CASCADE",
	},
};
