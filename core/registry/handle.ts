/**
 * Capabilities and type-erased module handles.
 *
 * A registry stores factories for many unrelated interfaces in one map, so
 * each factory erases its result into a ModuleHandle. Only the capability
 * that wrapped an instance can open the handle again: a handle produced as
 * one capability is never handed out as another, even when the instance
 * would structurally fit both.
 *
 * @example
 * ```typescript
 * const GreeterCapability = defineCapability<Greeter>("greeter");
 * registry.register({
 *   name: "hello",
 *   moduleType: "greeter",
 *   factory: () => GreeterCapability.wrap(new HelloGreeter()),
 * });
 * const greeter = await registry.createAs("hello", GreeterCapability);
 * ```
 */

import { TypeMismatchError } from "./errors.ts";

/** Reported as the actual capability when a guard rejects an instance */
export const GUARD_REJECTED = "<guard>";

/**
 * Minimum surface of every module instance.
 * Capability interfaces extend this with their own operations.
 */
export interface Module {
	readonly name: string;
	readonly moduleType: string;
}

/**
 * Runtime token standing for an application-defined interface.
 *
 * @typeParam T - Interface the capability stands for
 */
export interface Capability<T> {
	/** Human-readable identifier, used in error messages */
	readonly id: string;
	readonly description?: string;
	/** Erase an instance into a handle owned by this capability */
	wrap(instance: T): ModuleHandle;
	/** Instance behind a handle box, if this capability wrapped it */
	open(box: object): T | undefined;
}

export interface CapabilityOptions<T> {
	description?: string;
	/** Structural check run on every instance passed to `wrap`; a failure throws TypeMismatchError */
	guard?: (value: unknown) => value is T;
}

/**
 * Define a new capability. Two capabilities never share handles, even when
 * their ids are equal.
 */
export function defineCapability<T>(
	id: string,
	options: CapabilityOptions<T> = {},
): Capability<T> {
	if (id.trim().length === 0) {
		throw new Error("Capability id must not be empty");
	}

	const instances = new WeakMap<object, T>();

	return Object.freeze({
		id,
		description: options.description,
		wrap(instance: T): ModuleHandle {
			if (options.guard && !options.guard(instance)) {
				throw new TypeMismatchError(undefined, id, GUARD_REJECTED);
			}
			const box = {};
			instances.set(box, instance);
			return new ModuleHandle(id, box);
		},
		open(box: object): T | undefined {
			return instances.get(box);
		},
	});
}

/**
 * Opaque box holding one module instance.
 *
 * The registry never keeps a handle; ownership passes to whoever called
 * `create`.
 */
export class ModuleHandle {
	constructor(
		/** Id of the capability the instance was produced as */
		readonly capabilityId: string,
		private readonly box: object,
		/** Name the handle was created under, set by the registry */
		readonly moduleName?: string,
	) {}

	/**
	 * Erase an instance into a handle; same as `capability.wrap(instance)`.
	 */
	static of<T>(capability: Capability<T>, instance: T): ModuleHandle {
		return capability.wrap(instance);
	}

	/**
	 * Check whether this handle can be downcast to the capability.
	 */
	is<T>(capability: Capability<T>): boolean {
		return capability.open(this.box) !== undefined;
	}

	/**
	 * Recover the instance as the given capability.
	 *
	 * @throws TypeMismatchError if another capability wrapped the instance
	 */
	downcast<T>(capability: Capability<T>): T {
		const instance = capability.open(this.box);
		if (instance === undefined) {
			throw new TypeMismatchError(this.moduleName, capability.id, this.capabilityId);
		}
		return instance;
	}

	/**
	 * Same handle, labelled with the module name it was created under.
	 */
	withModuleName(moduleName: string): ModuleHandle {
		return new ModuleHandle(this.capabilityId, this.box, moduleName);
	}
}
