/**
 * Process-wide registry and its self-registration collection point.
 *
 * Modules call `submitRegistration()` at import time. The first call to
 * `globalRegistry()` drains every submission into a fresh registry and the
 * same instance is returned from then on. It is never torn down.
 *
 * Prefer passing the registry returned here to the code that needs it
 * rather than calling `globalRegistry()` from deep inside a module.
 */

import { createConsoleLogger, type RegistryLogger } from "../logger.ts";
import { InternalRegistryError } from "./errors.ts";
import type { ModuleRegistration } from "./metadata.ts";
import { ModuleRegistry } from "./module-registry.ts";

export type GlobalRegistryState = "uninitialized" | "initializing" | "ready";

const pending: ModuleRegistration[] = [];
let state: GlobalRegistryState = "uninitialized";
let instance: ModuleRegistry | null = null;
let bootstrapLogger: RegistryLogger = createConsoleLogger("ModuleRegistry", "warn");

/**
 * Contribute a registration to the global registry.
 * Before first access it is queued; afterwards it is registered directly.
 */
export function submitRegistration(registration: ModuleRegistration): void {
	if (instance) {
		instance.register(registration);
		return;
	}
	pending.push(registration);
}

/**
 * Number of registrations waiting for the global registry to be built.
 */
export function pendingRegistrationCount(): number {
	return pending.length;
}

/**
 * Snapshot of the queued registrations, in submission order.
 */
export function pendingRegistrations(): readonly ModuleRegistration[] {
	return [...pending];
}

/**
 * Remove a queued registration (matched by identity) before first access.
 * Returns false if it is not queued, including after the registry is built.
 */
export function withdrawRegistration(registration: ModuleRegistration): boolean {
	const index = pending.lastIndexOf(registration);
	if (index === -1) {
		return false;
	}
	pending.splice(index, 1);
	return true;
}

/**
 * Logger used by the global registry. Takes effect only before first access.
 */
export function setGlobalRegistryLogger(logger: RegistryLogger): void {
	bootstrapLogger = logger;
}

export function globalRegistryState(): GlobalRegistryState {
	return state;
}

/**
 * Get the global registry, building it on first access.
 *
 * If a queued registration is invalid or duplicated, the error propagates and
 * the queue is left as it was. Every later call fails the same way until the
 * offending entry is removed with `withdrawRegistration()`; inspect the queue
 * with `pendingRegistrations()`.
 *
 * @throws InternalRegistryError if called again while the registry is being built
 */
export function globalRegistry(): ModuleRegistry {
	if (instance) {
		return instance;
	}
	if (state === "initializing") {
		throw new InternalRegistryError(
			"globalRegistry() was called while the global registry was being built",
		);
	}

	state = "initializing";
	try {
		const registry = new ModuleRegistry({ logger: bootstrapLogger });
		for (const registration of pending) {
			registry.register(registration);
		}
		pending.length = 0;
		instance = registry;
		state = "ready";
		bootstrapLogger.info(`Module registry initialized with ${registry.size} modules`);
		return registry;
	} catch (error) {
		state = "uninitialized";
		throw error;
	}
}
