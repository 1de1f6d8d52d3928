/**
 * Longest subdomain a merchant may request.
 */
export const SUBDOMAIN_MAX_LENGTH = 50;

const SUBDOMAIN_REGEX = /^(?!-)[A-Za-z0-9-]+(?<!-)$/;

/**
 * Normalizes a requested subdomain: trims, lowercases, turns whitespace runs
 * into hyphens and keeps only the label before the first dot, so
 * "My Shop.example.com" becomes "my-shop".
 */
export function normalizeSubdomain(input: string): string {
	const normalized = input.trim().toLowerCase().replace(/\s+/g, "-");
	const dot = normalized.indexOf(".");
	return dot >= 0 ? normalized.substring(0, dot) : normalized;
}

/** Whether a normalized subdomain is a valid DNS label for a merchant. */
export function isValidSubdomain(subdomain: string): boolean {
	return subdomain.length <= SUBDOMAIN_MAX_LENGTH && SUBDOMAIN_REGEX.test(subdomain);
}

export function buildTenantDomain(subdomain: string, baseDomain: string): string {
	return `${subdomain}.${baseDomain}`;
}
