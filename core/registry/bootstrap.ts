/**
 * Explicit composition root.
 *
 * Instead of registering through import side effects, a module can export a
 * Registrar and the application calls all of them in one place.
 */

import { ModuleRegistry, type ModuleRegistryOptions } from "./module-registry.ts";

/**
 * Function that registers one or more modules into a registry.
 */
export type Registrar = (registry: ModuleRegistry) => void;

/**
 * Build a registry by running each registrar in order.
 */
export function bootstrapRegistry(
	registrars: readonly Registrar[],
	options: ModuleRegistryOptions = {},
): ModuleRegistry {
	const registry = new ModuleRegistry(options);
	for (const registrar of registrars) {
		registrar(registry);
	}
	return registry;
}
