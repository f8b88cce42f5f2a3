/**
 * Security module - metadata schemas, validator and the createSecure policy.
 */

export * from "./constants.ts";
export * from "./types.ts";
export {
	SecurityValidator,
	hasSecurityRisk,
	riskLevelOf,
	type ValidatorOptions,
} from "./validator.ts";
export {
	SecurityPolicy,
	SecurityRejectedError,
	type SecurityPolicyOptions,
	type SecurityRequirements,
} from "./policy.ts";
