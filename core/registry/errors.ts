/**
 * Registry error taxonomy.
 *
 * Every failure raised by the registry extends RegistryError and carries a
 * `code`, so callers can switch on it instead of matching messages:
 *
 * - not_found: no record under the requested name
 * - duplicate_name: the name or alias is already taken
 * - factory_failed: the factory threw or rejected (see `cause`)
 * - type_mismatch: the handle holds a different capability than requested
 * - invalid_registration: the registration input failed validation
 * - internal: a registry invariant was broken
 * - security_rejected: a security policy refused to create the module
 */

export type RegistryErrorCode =
	| "not_found"
	| "duplicate_name"
	| "factory_failed"
	| "type_mismatch"
	| "invalid_registration"
	| "internal"
	| "security_rejected";

/**
 * Base class for all registry errors.
 */
export class RegistryError extends Error {
	constructor(
		public readonly code: RegistryErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "RegistryError";
	}
}

/**
 * Error thrown when a requested item is not found in the registry.
 */
export class RegistryNotFoundError extends RegistryError {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super("not_found", `${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Error thrown when registration conflicts with an existing name or alias.
 */
export class RegistryConflictError extends RegistryError {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly conflictType: "key" | "alias",
	) {
		const type = conflictType === "key" ? "Key" : "Alias";
		super("duplicate_name", `${registryName}: ${type} "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

/**
 * Error thrown when a module factory throws or rejects.
 * The original error is kept as `cause`.
 */
export class FactoryFailedError extends RegistryError {
	constructor(
		public readonly moduleName: string,
		cause: unknown,
	) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super("factory_failed", `Failed to instantiate module "${moduleName}": ${reason}`, { cause });
		this.name = "FactoryFailedError";
	}
}

/**
 * Error thrown when a handle is downcast to a capability it was not produced as.
 */
export class TypeMismatchError extends RegistryError {
	constructor(
		public readonly moduleName: string | undefined,
		public readonly expected: string,
		public readonly actual: string,
	) {
		const subject = moduleName ? `module "${moduleName}"` : "module handle";
		super(
			"type_mismatch",
			`Type mismatch for ${subject}: expected capability "${expected}", got "${actual}"`,
		);
		this.name = "TypeMismatchError";
	}
}

/**
 * Error thrown when registration input fails validation.
 */
export class InvalidRegistrationError extends RegistryError {
	constructor(
		public readonly registryName: string,
		public readonly issues: string[],
	) {
		super(
			"invalid_registration",
			`${registryName}: invalid registration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
		);
		this.name = "InvalidRegistrationError";
	}
}

/**
 * Error thrown when a registry invariant is violated.
 */
export class InternalRegistryError extends RegistryError {
	constructor(message: string) {
		super("internal", message);
		this.name = "InternalRegistryError";
	}
}

/**
 * Narrow an unknown value to a RegistryError, optionally of a given code.
 */
export function isRegistryError(
	error: unknown,
	code?: RegistryErrorCode,
): error is RegistryError {
	return error instanceof RegistryError && (code === undefined || error.code === code);
}
