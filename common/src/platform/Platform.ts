/**
 * Client surfaces a request can declare. The first entry is the fallback used
 * for console and background invocations that carry no request.
 */
export const PLATFORMS = ["web", "mobile"] as const;

export type Platform = (typeof PLATFORMS)[number];

/** The (version, platform) pair a unit of work is bound to. */
export interface ResolvedPlatform {
	readonly version: string;
	readonly platform: Platform;
}

export function isPlatform(value: unknown): value is Platform {
	return typeof value === "string" && PLATFORMS.some(platform => platform === value);
}

/**
 * Matches a raw selector value against the given platforms, ignoring case.
 * Returns undefined when nothing matches.
 */
export function matchPlatform(value: string, platforms: ReadonlyArray<Platform> = PLATFORMS): Platform | undefined {
	const lowered = value.toLowerCase();
	return platforms.find(platform => platform === lowered);
}
