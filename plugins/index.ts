/**
 * Built-in plugins.
 *
 * Importing this module submits every built-in registration to the global
 * registry. Applications that build their own registry use
 * `builtinRegistrars` with bootstrapRegistry() instead.
 */

import { submitRegistration, type Registrar } from "../core/registry/index.ts";
import { registerTextProcessors, textProcessorRegistrations } from "./text-processors.ts";

export * from "./text-processors.ts";

export const builtinRegistrars: readonly Registrar[] = [registerTextProcessors];

for (const registration of textProcessorRegistrations) {
	submitRegistration(registration);
}
