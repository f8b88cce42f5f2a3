/**
 * SecurityPolicy - access control in front of a ModuleRegistry.
 *
 * Uses only the registry's public operations (lookup, list, create), so
 * records stay immutable: review decisions live in the policy's own ledger.
 */

import { createConsoleLogger, type RegistryLogger } from "../logger.ts";
import { RegistryError, RegistryNotFoundError } from "../registry/errors.ts";
import type { Capability, ModuleHandle } from "../registry/handle.ts";
import type { ModuleMetadata } from "../registry/metadata.ts";
import type { ModuleRegistry } from "../registry/module-registry.ts";
import {
	ModulePermissionsSchema,
	type CodeReviewStatus,
	type SecurityCheckResult,
	type SecurityReport,
} from "./types.ts";
import { SecurityValidator, type ValidatorOptions } from "./validator.ts";

/**
 * Which checks `createSecure` enforces.
 */
export interface SecurityRequirements {
	requireSignature: boolean;
	requireApproval: boolean;
	requireSupplyChain: boolean;
}

export interface SecurityPolicyOptions extends ValidatorOptions {
	requirements?: Partial<SecurityRequirements>;
	logger?: RegistryLogger;
}

/**
 * Error thrown when createSecure refuses a module.
 */
export class SecurityRejectedError extends RegistryError {
	constructor(
		public readonly moduleName: string,
		public readonly failedChecks: string[],
	) {
		super(
			"security_rejected",
			`Module "${moduleName}" rejected by security policy: ${failedChecks.join(", ")}`,
		);
		this.name = "SecurityRejectedError";
	}
}

const PENDING: CodeReviewStatus = Object.freeze({ state: "pending" });
const NO_PERMISSIONS = Object.freeze(ModulePermissionsSchema.parse({}));

export class SecurityPolicy {
	readonly validator: SecurityValidator;
	private readonly requirements: SecurityRequirements;
	// Keyed by the stored metadata: a module registered again under the same
	// name gets fresh metadata and starts over as pending.
	private readonly reviews = new WeakMap<ModuleMetadata, CodeReviewStatus>();
	private readonly logger: RegistryLogger;

	constructor(
		private readonly registry: ModuleRegistry,
		options: SecurityPolicyOptions = {},
	) {
		this.validator = new SecurityValidator(options);
		this.requirements = {
			requireSignature: options.requirements?.requireSignature ?? true,
			requireApproval: options.requirements?.requireApproval ?? true,
			requireSupplyChain: options.requirements?.requireSupplyChain ?? true,
		};
		this.logger = options.logger ?? createConsoleLogger("SecurityPolicy", "warn");
	}

	/**
	 * Record a code review decision for a registered module.
	 *
	 * @throws RegistryNotFoundError if the module is not registered
	 */
	setReviewStatus(name: string, status: CodeReviewStatus): void {
		const metadata = this.metadataOrThrow(name);
		this.reviews.set(metadata, status);
		this.logger.info(`Updated review status for module: ${metadata.name}`, { state: status.state });
	}

	/**
	 * Review status of a module; "pending" until one is recorded for the
	 * currently registered module under that name.
	 */
	reviewStatus(name: string): CodeReviewStatus {
		const metadata = this.registry.lookup(name);
		return (metadata && this.reviews.get(metadata)) ?? PENDING;
	}

	/**
	 * Names of the required checks the module fails.
	 *
	 * @throws RegistryNotFoundError if the module is not registered
	 */
	failedChecks(name: string): string[] {
		const metadata = this.metadataOrThrow(name);
		const failed: string[] = [];

		if (this.requirements.requireSignature && !this.validator.verifySignature(metadata)) {
			failed.push("signature");
		}
		if (this.requirements.requireApproval && !this.validator.isApproved(this.reviewStatus(name))) {
			failed.push("review");
		}
		if (this.requirements.requireSupplyChain && !this.validator.verifySupplyChain(metadata)) {
			failed.push("supply_chain");
		}
		return failed;
	}

	/**
	 * Create a module only if it passes every required check.
	 *
	 * @throws SecurityRejectedError listing the failed checks
	 */
	async createSecure(name: string): Promise<ModuleHandle>;
	async createSecure<T>(name: string, capability: Capability<T>): Promise<T>;
	async createSecure<T>(name: string, capability?: Capability<T>): Promise<ModuleHandle | T> {
		const failed = this.failedChecks(name);
		if (failed.length > 0) {
			this.logger.warn(`Refusing to create module: ${name}`, { failed });
			throw new SecurityRejectedError(name, failed);
		}

		const metadata = this.metadataOrThrow(name);
		if (metadata.security?.sandbox.enabled) {
			this.logger.debug(`Creating sandboxed module: ${metadata.name}`, {
				sandbox: metadata.security.sandbox,
			});
		}

		return capability ? this.registry.createAs(name, capability) : this.registry.create(name);
	}

	/**
	 * Security summary for every registered module.
	 */
	report(): Record<string, SecurityReport> {
		const result: Record<string, SecurityReport> = {};
		for (const name of this.registry.list()) {
			const metadata = this.metadataOrThrow(name);
			const security = metadata.security;
			result[name] = {
				name,
				hasSignature: security?.signature !== undefined,
				signatureVerified: this.validator.verifySignature(metadata),
				isApproved: this.validator.isApproved(this.reviewStatus(name)),
				hasSupplyChain: security?.supplyChain !== undefined,
				supplyChainVerified: this.validator.verifySupplyChain(metadata),
				permissions: security?.permissions ?? NO_PERMISSIONS,
				sandboxEnabled: security?.sandbox.enabled ?? false,
			};
		}
		return result;
	}

	/**
	 * Comprehensive check of every registered module.
	 */
	audit(): Record<string, SecurityCheckResult> {
		const result: Record<string, SecurityCheckResult> = {};
		for (const name of this.registry.list()) {
			result[name] = this.validator.comprehensiveCheck(
				this.metadataOrThrow(name),
				this.reviewStatus(name),
			);
		}
		return result;
	}

	private metadataOrThrow(name: string): ModuleMetadata {
		const metadata = this.registry.lookup(name);
		if (!metadata) {
			throw new RegistryNotFoundError(name, "SecurityPolicy", this.registry.list());
		}
		return metadata;
	}
}
