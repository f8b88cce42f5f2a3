/**
 * Module Registry - runtime catalog of named module factories.
 *
 * Producers register a factory under a unique name; consumers create fresh
 * instances by name and downcast them to the capability they expect.
 *
 * Duplicate names are rejected: a second registration under a taken name or
 * alias throws RegistryConflictError and leaves the existing record in place.
 * To replace a module, unregister it first.
 */

import { createConsoleLogger, type RegistryLogger } from "../logger.ts";
import { BaseRegistry } from "./base-registry.ts";
import {
	FactoryFailedError,
	InternalRegistryError,
	InvalidRegistrationError,
	RegistryError,
	TypeMismatchError,
} from "./errors.ts";
import { ModuleHandle, type Capability } from "./handle.ts";
import {
	buildRecord,
	formatIssues,
	ModuleRegistrationSchema,
	type ModuleMetadata,
	type ModuleRegistration,
	type RegistrationRecord,
} from "./metadata.ts";

/**
 * Outcome of the non-throwing create variants.
 */
export type SafeCreateResult<T> =
	| { success: true; data: T }
	| { success: false; error: RegistryError };

export interface ModuleRegistryOptions {
	/** Name used in error messages (default: "ModuleRegistry") */
	name?: string;
	logger?: RegistryLogger;
}

/**
 * Central registry for module factories.
 *
 * Extends BaseRegistry for the keyed store (names, aliases, conflicts).
 */
export class ModuleRegistry extends BaseRegistry<RegistrationRecord> {
	private readonly logger: RegistryLogger;

	constructor(options: ModuleRegistryOptions = {}) {
		super({ name: options.name ?? "ModuleRegistry" });
		this.logger = options.logger ?? createConsoleLogger(this.registryName, "warn");
	}

	/**
	 * Register a module factory.
	 *
	 * @returns the stored metadata
	 * @throws InvalidRegistrationError if the input fails validation
	 * @throws RegistryConflictError if the name or an alias is taken
	 */
	register(registration: ModuleRegistration): ModuleMetadata {
		const parsed = ModuleRegistrationSchema.safeParse(registration);
		if (!parsed.success) {
			throw new InvalidRegistrationError(this.registryName, formatIssues(parsed.error));
		}

		const record = buildRecord(parsed.data);
		this.registerItem(record.name, record, record.metadata.aliases);
		this.logger.debug(`Registered module: ${record.name} (type: ${record.moduleType})`);
		return record.metadata;
	}

	/**
	 * Remove a module and its aliases.
	 * Returns false if nothing was registered under the name.
	 */
	unregister(name: string): boolean {
		const removed = this.delete(name);
		if (removed) {
			this.logger.debug(`Unregistered module: ${name}`);
		}
		return removed;
	}

	/**
	 * Metadata for a module by name or alias.
	 */
	lookup(name: string): ModuleMetadata | undefined {
		return this.get(name)?.metadata;
	}

	/**
	 * Metadata catalog accessor; same as `lookup`.
	 */
	getMetadata(name: string): ModuleMetadata | undefined {
		return this.lookup(name);
	}

	/**
	 * Primary names of all registered modules, sorted.
	 */
	list(): string[] {
		return this.keys();
	}

	/**
	 * All stored records, sorted by name.
	 */
	records(): RegistrationRecord[] {
		return this.values();
	}

	/**
	 * Invoke the factory registered under `name`.
	 *
	 * The record is resolved first; the factory then runs with the store
	 * untouched, so it may itself call back into this registry.
	 * Every call invokes the factory again; nothing is cached.
	 * Registry errors raised inside the factory (a guard rejecting the
	 * instance, a nested create failing) propagate unchanged.
	 *
	 * @throws RegistryNotFoundError if the name is not registered
	 * @throws FactoryFailedError if the factory throws or rejects
	 * @throws TypeMismatchError if the factory's instance fails its capability guard
	 * @throws InternalRegistryError if the factory returns something other than a ModuleHandle
	 */
	async create(name: string): Promise<ModuleHandle> {
		const record = this.getOrThrow(name);
		this.logger.debug(`Creating module: ${record.name}`);

		let produced: unknown;
		try {
			produced = await record.factory();
		} catch (error) {
			if (error instanceof TypeMismatchError && error.moduleName === undefined) {
				throw new TypeMismatchError(record.name, error.expected, error.actual);
			}
			if (error instanceof RegistryError) {
				throw error;
			}
			this.logger.warn(`Factory for module ${record.name} failed`, { error: String(error) });
			throw new FactoryFailedError(record.name, error);
		}

		if (!(produced instanceof ModuleHandle)) {
			throw new InternalRegistryError(
				`Factory for module "${record.name}" did not return a ModuleHandle; wrap the instance with capability.wrap()`,
			);
		}
		return produced.withModuleName(record.name);
	}

	/**
	 * Create a module and downcast it to the expected capability.
	 *
	 * @throws TypeMismatchError if the module was produced as another capability
	 */
	async createAs<T>(name: string, capability: Capability<T>): Promise<T> {
		const handle = await this.create(name);
		return handle.downcast(capability);
	}

	/**
	 * Like `create`, but reports registry errors as a result value.
	 * Errors that are not RegistryErrors still reject.
	 */
	async safeCreate(name: string): Promise<SafeCreateResult<ModuleHandle>> {
		return settle(() => this.create(name));
	}

	/**
	 * Like `createAs`, but reports registry errors as a result value.
	 */
	async safeCreateAs<T>(name: string, capability: Capability<T>): Promise<SafeCreateResult<T>> {
		return settle(() => this.createAs(name, capability));
	}
}

async function settle<T>(operation: () => Promise<T>): Promise<SafeCreateResult<T>> {
	try {
		return { success: true, data: await operation() };
	} catch (error) {
		if (error instanceof RegistryError) {
			return { success: false, error };
		}
		throw error;
	}
}
