import type { Request } from "express";

/**
 * Removes a trailing `:port` from a host header value, keeping bracketed IPv6
 * addresses intact.
 */
export function stripPort(host: string): string {
	if (host.startsWith("[")) {
		const end = host.indexOf("]");
		return end === -1 ? host : host.substring(0, end + 1);
	}
	const colon = host.indexOf(":");
	return colon === -1 ? host : host.substring(0, colon);
}

/**
 * The host a request was addressed to, port stripped and otherwise exactly as
 * sent. Domains are looked up verbatim, so no case folding happens here.
 */
export function getRequestHost(req: Request): string | undefined {
	const host = req.headers.host;
	return host ? stripPort(host) : undefined;
}
