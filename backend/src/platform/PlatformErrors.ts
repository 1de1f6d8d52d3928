import { AppError } from "../util/AppError";

/** The request path does not start with `api/{version}/` for any configured version. */
export class InvalidVersionError extends AppError {
	readonly path: string;

	constructor(path: string, versions: ReadonlyArray<string>) {
		super("configuration", 500, "invalid_version", `No configured API version (${versions.join(", ")}) matches the request path`);
		this.name = "InvalidVersionError";
		this.path = path;
	}
}

export class MissingPlatformError extends AppError {
	constructor(header: string, platforms: ReadonlyArray<string>) {
		super(
			"client",
			400,
			"missing_platform",
			`The ${header} header is required. Valid platforms: ${platforms.join(", ")}`,
		);
		this.name = "MissingPlatformError";
	}
}

export class UnknownPlatformError extends AppError {
	readonly value: string;

	constructor(value: string, platforms: ReadonlyArray<string>) {
		super("client", 400, "unknown_platform", `Unknown platform "${value}". Valid platforms: ${platforms.join(", ")}`);
		this.name = "UnknownPlatformError";
		this.value = value;
	}
}

/** No concrete implementation of a contract is registered for the resolved platform. */
export class NoImplementationFoundError extends AppError {
	readonly contract: string;
	readonly version: string;
	readonly platform: string;

	constructor(contract: string, version: string, platform: string) {
		super(
			"configuration",
			500,
			"no_implementation",
			`No implementation found for ${contract} on platform ${platform} (API ${version})`,
		);
		this.name = "NoImplementationFoundError";
		this.contract = contract;
		this.version = version;
		this.platform = platform;
	}
}

export class DuplicateBindingError extends AppError {
	constructor(contract: string, version: string, platform: string) {
		super(
			"configuration",
			500,
			"duplicate_binding",
			`${contract} already has an implementation for platform ${platform} (API ${version})`,
		);
		this.name = "DuplicateBindingError";
	}
}

export class CircularBindingError extends AppError {
	constructor(path: ReadonlyArray<string>) {
		super("configuration", 500, "circular_binding", `Circular binding: ${path.join(" -> ")}`);
		this.name = "CircularBindingError";
	}
}
