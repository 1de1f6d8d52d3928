/**
 * PlatformDetector - resolves the (API version, platform) pair a request is
 * served under.
 *
 * Real traffic never falls back to a default platform: a request whose path
 * is not under a configured `api/{version}/` prefix is a configuration error,
 * and a missing or unknown platform header is a client error. Only console
 * and background invocations, which have no request, get the fallback of the
 * first configured version and platform.
 *
 * @module PlatformDetector
 */

import { InvalidVersionError, MissingPlatformError, UnknownPlatformError } from "./PlatformErrors";
import { matchPlatform, type Platform, type ResolvedPlatform } from "storefront-common";

export type HeaderValue = string | Array<string> | undefined;

/** The parts of a request platform detection looks at. */
export interface RequestDescriptor {
	/** Request path, with or without leading slash and query string */
	path: string;
	/** Header values keyed by lowercase name */
	headers: Record<string, HeaderValue>;
}

export interface PlatformDetectorOptions {
	versions: ReadonlyArray<string>;
	platforms: ReadonlyArray<Platform>;
	/** Name of the platform selector header */
	header: string;
}

export interface PlatformDetector {
	readonly versions: ReadonlyArray<string>;
	readonly platforms: ReadonlyArray<Platform>;
	/** Resolves a request, or the console fallback when there is none. */
	detect(request: RequestDescriptor | undefined): ResolvedPlatform;
	/** First configured version and first configured platform. */
	consoleFallback(): ResolvedPlatform;
	/** The version whose `api/{version}/` prefix the path starts with, if any. */
	matchVersion(path: string): string | undefined;
}

export function createPlatformDetector(options: PlatformDetectorOptions): PlatformDetector {
	const { versions, platforms } = options;
	const header = options.header.toLowerCase();
	const [firstVersion] = versions;
	const [firstPlatform] = platforms;
	if (firstVersion === undefined || firstPlatform === undefined) {
		throw new Error("At least one API version and one platform must be configured");
	}

	return {
		versions,
		platforms,
		detect,
		consoleFallback,
		matchVersion,
	};

	function consoleFallback(): ResolvedPlatform {
		return { version: firstVersion, platform: firstPlatform };
	}

	function detect(request: RequestDescriptor | undefined): ResolvedPlatform {
		if (!request) {
			return consoleFallback();
		}

		const version = matchVersion(request.path);
		if (!version) {
			throw new InvalidVersionError(request.path, versions);
		}

		const value = firstValue(request.headers[header]);
		if (!value) {
			throw new MissingPlatformError(header, platforms);
		}

		const platform = matchPlatform(value, platforms);
		if (!platform) {
			throw new UnknownPlatformError(value, platforms);
		}
		return { version, platform };
	}

	function matchVersion(path: string): string | undefined {
		const normalized = normalizePath(path);
		return versions.find(version => normalized.startsWith(`api/${version}/`));
	}
}

function normalizePath(path: string): string {
	const queryStart = path.indexOf("?");
	const withoutQuery = queryStart === -1 ? path : path.substring(0, queryStart);
	return withoutQuery.replace(/^\/+/, "");
}

function firstValue(value: HeaderValue): string | undefined {
	return Array.isArray(value) ? value[0] : value;
}
