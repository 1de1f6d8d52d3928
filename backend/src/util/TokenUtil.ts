import type { Request } from "express";
import jwt, { type Algorithm } from "jsonwebtoken";
import { z } from "zod";

export interface TokenUtil<T> {
	generateToken(payload: T): string;
	decodePayload(req: Request): T | undefined;
	decodePayloadFromToken(token: string): T | undefined;
}

export interface TokenOptions {
	secret: string;
	algorithm: Algorithm;
	expiresInSeconds: number;
}

/**
 * Claims carried by the token issued at sign-in. A token only opens the
 * tenant it was issued for.
 */
export const SessionClaimsSchema = z.object({
	userId: z.number().int(),
	email: z.string(),
	tenantId: z.string(),
	platform: z.string(),
});

export type SessionClaims = z.infer<typeof SessionClaimsSchema>;

/**
 * Signs and verifies JWTs whose payload is checked against `schema` on the
 * way back in; tokens that fail verification or parsing decode to undefined.
 */
export function createTokenUtil<T extends object>(schema: z.ZodType<T>, options: TokenOptions): TokenUtil<T> {
	return { generateToken, decodePayload, decodePayloadFromToken };

	function generateToken(payload: T): string {
		return jwt.sign(payload, options.secret, {
			algorithm: options.algorithm,
			expiresIn: options.expiresInSeconds,
		});
	}

	function decodePayload(req: Request): T | undefined {
		const authHeader = req.headers.authorization;
		if (authHeader?.startsWith("Bearer ")) {
			return decodePayloadFromToken(authHeader.slice(7));
		}
	}

	function decodePayloadFromToken(token: string): T | undefined {
		let decoded: unknown;
		try {
			decoded = jwt.verify(token, options.secret, { algorithms: [options.algorithm] });
		} catch {
			return;
		}
		const parsed = schema.safeParse(decoded);
		return parsed.success ? parsed.data : undefined;
	}
}
