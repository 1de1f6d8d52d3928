import { getLog } from "../util/Logger";
import { CircularBindingError, NoImplementationFoundError } from "./PlatformErrors";
import type { BindingScope, Contract, PlatformRegistry } from "./PlatformRegistry";
import type { Platform, ResolvedPlatform } from "storefront-common";

const log = getLog(import.meta);

/**
 * Binds contracts to implementations for one unit of work. Each contract is
 * created at most once per scope; a new request gets a new scope, so requests
 * for different platforms never share instances.
 */
export class PlatformScope implements BindingScope {
	/** Contracts being created, outermost first; compared by identity */
	private readonly resolving: Array<{ contract: object; name: string }> = [];

	constructor(
		private readonly registry: PlatformRegistry,
		readonly resolved: ResolvedPlatform,
	) {}

	get version(): string {
		return this.resolved.version;
	}

	get platform(): Platform {
		return this.resolved.platform;
	}

	/**
	 * Returns the implementation of the contract for this scope's platform,
	 * creating it (and whatever it binds in turn) on first use.
	 *
	 * @throws NoImplementationFoundError when the platform has no implementation
	 * @throws CircularBindingError when implementations bind each other in a loop
	 */
	bind<T>(contract: Contract<T>): T {
		const existing = contract.instanceIn(this);
		if (existing) {
			return existing.value;
		}
		if (this.resolving.some(entry => entry.contract === contract)) {
			throw new CircularBindingError([...this.resolving.map(entry => entry.name), contract.name]);
		}

		const binding = this.registry
			.implementationsFor(this.version, contract)
			.find(candidate => candidate.platform === this.platform);
		if (!binding) {
			log.error("No implementation of %s for platform %s (API %s)", contract.name, this.platform, this.version);
			throw new NoImplementationFoundError(contract.name, this.version, this.platform);
		}

		this.resolving.push({ contract, name: contract.name });
		try {
			const instance = binding.create(this);
			contract.rememberInstance(this, instance);
			return instance;
		} finally {
			this.resolving.pop();
		}
	}

	/** True when the contract has an implementation for this scope's platform. */
	canBind<T>(contract: Contract<T>): boolean {
		return this.registry
			.implementationsFor(this.version, contract)
			.some(candidate => candidate.platform === this.platform);
	}
}
