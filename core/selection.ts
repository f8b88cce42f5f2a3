/**
 * Provider selection - pick the implementation named by configuration.
 *
 * @example
 * ```yaml
 * selections:
 *   database: postgres
 * ```
 * ```typescript
 * const db = await createSelected(registry, config, "database", DatabaseCapability);
 * ```
 */

import type { RegistryConfig } from "./config.ts";
import type { Capability } from "./registry/handle.ts";
import type { ModuleRegistry } from "./registry/module-registry.ts";

/**
 * Error thrown when the configuration names no module for a slot.
 */
export class SelectionError extends Error {
	constructor(
		public readonly slot: string,
		public readonly availableSlots: string[],
	) {
		const available = availableSlots.length > 0
			? `Configured slots: ${availableSlots.join(", ")}`
			: "No slots configured";
		super(`No module selected for slot "${slot}". ${available}`);
		this.name = "SelectionError";
	}
}

/**
 * Module name configured for a slot.
 *
 * @throws SelectionError if the slot is not configured
 */
export function resolveSelection(config: Pick<RegistryConfig, "selections">, slot: string): string {
	const name = config.selections[slot];
	if (name === undefined) {
		throw new SelectionError(slot, Object.keys(config.selections).sort());
	}
	return name;
}

/**
 * Create the module configured for a slot as the given capability.
 * Registry errors (not found, factory failed, type mismatch) propagate as is.
 */
export async function createSelected<T>(
	registry: ModuleRegistry,
	config: Pick<RegistryConfig, "selections">,
	slot: string,
	capability: Capability<T>,
): Promise<T> {
	return registry.createAs(resolveSelection(config, slot), capability);
}
