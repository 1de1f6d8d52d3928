/**
 * Request contracts for authentication. Each platform binds its own
 * validation rules; web sign-ups must describe the store in at least 100
 * characters, mobile sign-ups may leave the description out.
 */

import { defineContract } from "../platform/PlatformRegistry";
import { parseInput } from "../util/RouterUtil";
import {
	buildTenantDomain,
	getPasswordErrorMessage,
	isValidSubdomain,
	normalizeSubdomain,
	validatePassword,
} from "storefront-common";
import { z } from "zod";

export interface SignUpInput {
	name: string;
	email: string;
	password: string;
	merchantName: string;
	merchantDescription: string | null;
	/** Normalized subdomain, e.g. `store1` */
	merchantSubdomain: string;
	/** `{subdomain}.{base domain}` */
	merchantDomain: string;
}

export interface SignInInput {
	email: string;
	password: string;
}

export interface SignUpRequest {
	parse(body: unknown): SignUpInput;
}

export interface SignInRequest {
	parse(body: unknown): SignInInput;
}

export const SignUpRequest = defineContract<SignUpRequest>("SignUpRequest");
export const SignInRequest = defineContract<SignInRequest>("SignInRequest");

export const WEB_DESCRIPTION_MIN_LENGTH = 100;

const PasswordSchema = z.string().superRefine((password, ctx) => {
	const result = validatePassword(password);
	if (result.error) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: getPasswordErrorMessage(result.error) });
	}
});

const SubdomainSchema = z
	.string()
	.transform(normalizeSubdomain)
	.refine(isValidSubdomain, "Must be at most 50 letters, digits or inner hyphens");

function signUpSchema(description: z.ZodType<string | null, z.ZodTypeDef, unknown>) {
	return z.object({
		name: z.string().trim().min(1),
		email: z.string().trim().email(),
		password: PasswordSchema,
		merchant_name: z.string().trim().min(1),
		merchant_description: description,
		merchant_subdomain: SubdomainSchema,
	});
}

const WebSignUpSchema = signUpSchema(z.string().trim().min(WEB_DESCRIPTION_MIN_LENGTH));

const MobileSignUpSchema = signUpSchema(
	z
		.string()
		.trim()
		.nullish()
		.transform(value => (value ? value : null)),
);

const SignInSchema = z.object({
	email: z.string().trim().email(),
	password: z.string().min(1),
});

function createSignUpRequest(schema: ReturnType<typeof signUpSchema>, baseDomain: string): SignUpRequest {
	return {
		parse(body: unknown): SignUpInput {
			const input = parseInput(schema, body);
			return {
				name: input.name,
				email: input.email,
				password: input.password,
				merchantName: input.merchant_name,
				merchantDescription: input.merchant_description,
				merchantSubdomain: input.merchant_subdomain,
				merchantDomain: buildTenantDomain(input.merchant_subdomain, baseDomain),
			};
		},
	};
}

export function createWebSignUpRequest(baseDomain: string): SignUpRequest {
	return createSignUpRequest(WebSignUpSchema, baseDomain);
}

export function createMobileSignUpRequest(baseDomain: string): SignUpRequest {
	return createSignUpRequest(MobileSignUpSchema, baseDomain);
}

export function createSignInRequest(): SignInRequest {
	return {
		parse: body => parseInput(SignInSchema, body),
	};
}
