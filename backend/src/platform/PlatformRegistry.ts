import { getLog } from "../util/Logger";
import { DuplicateBindingError } from "./PlatformErrors";
import type { Platform } from "storefront-common";

const log = getLog(import.meta);

/**
 * A concrete implementation of a contract for one platform. `create` runs at
 * most once per request scope and may bind other contracts through the scope
 * it receives.
 */
export interface Binding<T> {
	readonly implementation: string;
	readonly platform: Platform;
	readonly create: (scope: BindingScope) => T;
}

/** What a binding's factory can see of the request it is created for. */
export interface BindingScope {
	readonly version: string;
	readonly platform: Platform;
	bind<T>(contract: Contract<T>): T;
}

/**
 * A named capability with platform-specific implementations, e.g. the
 * authentication service. Contracts are compared by identity, never by name.
 *
 * Each contract keeps its own typed tables, keyed by the registry or scope
 * that owns the entries.
 */
export class Contract<T> {
	private readonly tables = new WeakMap<object, Map<string, Array<Binding<T>>>>();
	private readonly instances = new WeakMap<object, { value: T }>();

	constructor(readonly name: string) {}

	bindingsIn(registry: object, version: string): ReadonlyArray<Binding<T>> {
		return this.tables.get(registry)?.get(version) ?? [];
	}

	addBinding(registry: object, version: string, binding: Binding<T>): void {
		let versions = this.tables.get(registry);
		if (!versions) {
			versions = new Map();
			this.tables.set(registry, versions);
		}
		const bindings = versions.get(version) ?? [];
		bindings.push(binding);
		versions.set(version, bindings);
	}

	instanceIn(scope: object): { value: T } | undefined {
		return this.instances.get(scope);
	}

	rememberInstance(scope: object, value: T): void {
		this.instances.set(scope, { value });
	}

	toString(): string {
		return this.name;
	}
}

export function defineContract<T>(name: string): Contract<T> {
	return new Contract<T>(name);
}

export interface BindingEntry {
	version: string;
	contract: string;
	implementation: string;
	platform: Platform;
}

/**
 * Static binding table from (API version, contract) to the implementations
 * available per platform. Populated once at startup.
 */
export class PlatformRegistry {
	private readonly entries: Array<BindingEntry> = [];

	/**
	 * Adds an implementation. A second implementation for the same version,
	 * contract and platform is rejected here, so lookups never see ambiguity.
	 */
	register<T>(version: string, contract: Contract<T>, binding: Binding<T>): this {
		if (contract.bindingsIn(this, version).some(existing => existing.platform === binding.platform)) {
			throw new DuplicateBindingError(contract.name, version, binding.platform);
		}
		contract.addBinding(this, version, binding);
		this.entries.push({
			version,
			contract: contract.name,
			implementation: binding.implementation,
			platform: binding.platform,
		});
		log.debug(
			"Bound %s to %s for platform %s (API %s)",
			contract.name,
			binding.implementation,
			binding.platform,
			version,
		);
		return this;
	}

	/** Registers the same binding under every given version. */
	registerAll<T>(versions: ReadonlyArray<string>, contract: Contract<T>, binding: Binding<T>): this {
		for (const version of versions) {
			this.register(version, contract, binding);
		}
		return this;
	}

	/** Candidates in registration order; empty for an unknown version or contract. */
	implementationsFor<T>(version: string, contract: Contract<T>): ReadonlyArray<Binding<T>> {
		return contract.bindingsIn(this, version);
	}

	list(): Array<BindingEntry> {
		return this.entries.map(entry => ({ ...entry }));
	}
}
