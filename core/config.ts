/**
 * Registry configuration.
 * Loads registry.yaml, interpolates environment variables and validates the
 * result with Zod.
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z, ZodError } from "zod";
import { DEFAULT_SIGNATURE_ALGORITHM, SIGNATURE_EXPIRY_SECONDS } from "./security/constants.ts";

export const DEFAULT_CONFIG_PATH = "registry.yaml";
export const CONFIG_PATH_ENV = "MODULE_REGISTRY_CONFIG";

// ============================================================================
// Registry Configuration Schema
// ============================================================================

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const DiscoveryConfigSchema = z.object({
	concurrency: z.number().int().positive().default(4),
});

const SecurityConfigSchema = z.object({
	requireSignature: z.boolean().default(true),
	requireApproval: z.boolean().default(true),
	requireSupplyChain: z.boolean().default(true),
	signatureAlgorithm: z.string().default(DEFAULT_SIGNATURE_ALGORITHM),
	signatureExpirySeconds: z.number().int().positive().default(SIGNATURE_EXPIRY_SECONDS),
});

export const RegistryConfigSchema = z.object({
	logLevel: LogLevelSchema.default("warn"),
	/** Capability slot -> module name, e.g. { database: "postgres" } */
	selections: z.record(z.string(), z.string().min(1)).default({}),
	discovery: DiscoveryConfigSchema.default({}),
	security: SecurityConfigSchema.default({}),
});

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

/**
 * Error thrown when a configuration file cannot be parsed or validated.
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly source: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConfigError";
	}
}

// ============================================================================
// Environment Interpolation
// ============================================================================

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 */
export function interpolateEnvVars(
	value: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			if (defaultValue !== undefined) {
				return defaultValue;
			}
			// Unset without default: keep the placeholder
			return match;
		},
	);
}

/**
 * Recursively interpolate environment variables in an object.
 */
export function interpolateEnvVarsInObject(
	obj: unknown,
	env: NodeJS.ProcessEnv = process.env,
): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj, env);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item, env));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value, env);
		}
		return result;
	}
	return obj;
}

/**
 * Format Zod validation errors for user-friendly display.
 */
function formatZodError(error: ZodError, source: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
	return `Validation failed for ${source}:\n${issues.join("\n")}`;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate an in-memory configuration object (after interpolation).
 *
 * @throws ConfigError listing every validation issue
 */
export function parseRegistryConfig(raw: unknown, source = "<inline>"): RegistryConfig {
	const result = RegistryConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(formatZodError(result.error, source), source, { cause: result.error });
	}
	return result.data;
}

/**
 * Load the registry configuration.
 *
 * Path resolution: explicit argument, then $MODULE_REGISTRY_CONFIG, then
 * ./registry.yaml. A missing file yields the defaults.
 *
 * @throws ConfigError if the file is not valid YAML or fails validation
 */
export async function loadRegistryConfig(
	path?: string,
	env: NodeJS.ProcessEnv = process.env,
): Promise<RegistryConfig> {
	const configPath = path ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;

	let content: string;
	try {
		content = await readFile(configPath, "utf8");
	} catch (error) {
		if (isMissingFile(error)) {
			return parseRegistryConfig({}, configPath);
		}
		throw new ConfigError(`Failed to read config from ${configPath}`, configPath, { cause: error });
	}

	let raw: unknown;
	try {
		raw = parse(content);
	} catch (error) {
		throw new ConfigError(`Invalid YAML in ${configPath}: ${String(error)}`, configPath, {
			cause: error,
		});
	}

	return parseRegistryConfig(interpolateEnvVarsInObject(raw, env), configPath);
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
