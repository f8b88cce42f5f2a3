/**
 * Registration input, records and the metadata catalog entry kept per module.
 */

import { z } from "zod";
import { ModuleSecuritySchema, type ModuleSecurity, type ModuleSecurityInput } from "../security/types.ts";
import {
	DEFAULT_INSTANTIATE_FN,
	DEFAULT_MODULE_PATH,
	DEFAULT_STRUCT_NAME,
	MAX_MODULE_NAME_LENGTH,
	MAX_MODULE_TYPE_LENGTH,
	MAX_PATH_LENGTH,
} from "./constants.ts";
import type { ModuleHandle } from "./handle.ts";

/**
 * Zero-argument constructor stored in the registry.
 * May do I/O; a thrown error or rejection surfaces as FactoryFailedError.
 */
export type ModuleFactory = () => ModuleHandle | Promise<ModuleHandle>;

/**
 * Input accepted by `ModuleRegistry.register`.
 */
export interface ModuleRegistration {
	/** Unique module name */
	name: string;
	/** Coarse type tag (e.g. "plugin", "database") */
	moduleType: string;
	factory: ModuleFactory;
	/** Implementation name, for diagnostics */
	structName?: string;
	/** Source location, for diagnostics */
	modulePath?: string;
	/** Name of the factory function, for diagnostics */
	instantiateFn?: string;
	/** Capability tags used by discovery */
	tags?: readonly string[];
	/** Extra names that resolve to this module */
	aliases?: readonly string[];
	description?: string;
	security?: ModuleSecurityInput;
}

/**
 * Descriptive data stored next to each record. Frozen once stored.
 */
export interface ModuleMetadata {
	readonly name: string;
	readonly moduleType: string;
	readonly structName: string;
	readonly modulePath: string;
	readonly instantiateFn: string;
	readonly tags: readonly string[];
	readonly aliases: readonly string[];
	readonly description?: string;
	readonly security?: ModuleSecurity;
}

/**
 * Immutable record held by the registry store.
 */
export interface RegistrationRecord {
	readonly name: string;
	readonly moduleType: string;
	readonly factory: ModuleFactory;
	readonly metadata: ModuleMetadata;
}

const nonBlank = (label: string, max: number) =>
	z
		.string()
		.max(max, `${label} must be at most ${max} characters`)
		.refine((value) => value.trim().length > 0, `${label} must not be empty`);

export const ModuleRegistrationSchema = z.object({
	name: nonBlank("name", MAX_MODULE_NAME_LENGTH),
	moduleType: nonBlank("moduleType", MAX_MODULE_TYPE_LENGTH),
	factory: z.custom<ModuleFactory>(
		(value) => typeof value === "function",
		"factory must be a function",
	),
	structName: z.string().min(1).default(DEFAULT_STRUCT_NAME),
	modulePath: z.string().min(1).max(MAX_PATH_LENGTH).default(DEFAULT_MODULE_PATH),
	instantiateFn: z.string().min(1).default(DEFAULT_INSTANTIATE_FN),
	tags: z.array(z.string().min(1, "tags must not be empty strings")).default([]),
	aliases: z.array(nonBlank("alias", MAX_MODULE_NAME_LENGTH)).default([]),
	description: z.string().optional(),
	security: ModuleSecuritySchema.optional(),
});

/**
 * Format zod issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `${path ? `${path}: ` : ""}${issue.message}`;
	});
}

/**
 * Build the frozen record for a validated registration.
 */
export function buildRecord(
	input: z.infer<typeof ModuleRegistrationSchema>,
): RegistrationRecord {
	const metadata: ModuleMetadata = Object.freeze({
		name: input.name,
		moduleType: input.moduleType,
		structName: input.structName,
		modulePath: input.modulePath,
		instantiateFn: input.instantiateFn,
		tags: Object.freeze([...new Set(input.tags)].sort()),
		aliases: Object.freeze([...input.aliases]),
		description: input.description,
		security: input.security ? deepFreeze(input.security) : undefined,
	});

	return Object.freeze({
		name: input.name,
		moduleType: input.moduleType,
		factory: input.factory,
		metadata,
	});
}

function deepFreeze<T extends object>(value: T): T {
	for (const child of Object.values(value)) {
		if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}
