/**
 * Registry module - module store, capabilities, discovery and the global registry.
 */

export {
	BaseRegistry,
	type RegistryOptions,
} from "./base-registry.ts";
export {
	RegistryError,
	RegistryNotFoundError,
	RegistryConflictError,
	FactoryFailedError,
	TypeMismatchError,
	InvalidRegistrationError,
	InternalRegistryError,
	isRegistryError,
	type RegistryErrorCode,
} from "./errors.ts";
export {
	defineCapability,
	GUARD_REJECTED,
	ModuleHandle,
	type Capability,
	type CapabilityOptions,
	type Module,
} from "./handle.ts";
export {
	ModuleRegistrationSchema,
	type ModuleFactory,
	type ModuleMetadata,
	type ModuleRegistration,
	type RegistrationRecord,
} from "./metadata.ts";
export {
	ModuleRegistry,
	type ModuleRegistryOptions,
	type SafeCreateResult,
} from "./module-registry.ts";
export {
	createMatching,
	describeMatches,
	discover,
	matchesQuery,
	type CreatedModule,
	type CreateMatchingOptions,
	type DiscoveryMatch,
	type DiscoveryQuery,
} from "./discovery.ts";
export {
	globalRegistry,
	globalRegistryState,
	pendingRegistrationCount,
	pendingRegistrations,
	setGlobalRegistryLogger,
	submitRegistration,
	withdrawRegistration,
	type GlobalRegistryState,
} from "./global.ts";
export { bootstrapRegistry, type Registrar } from "./bootstrap.ts";
export * from "./constants.ts";
