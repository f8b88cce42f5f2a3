/**
 * Security checks over module metadata.
 *
 * All checks are pure: they read metadata and a clock, never the registry.
 * Signature and supply chain checks are structural; no cryptographic
 * verification happens here.
 */

import type { ModuleMetadata } from "../registry/metadata.ts";
import { DEFAULT_SIGNATURE_ALGORITHM, SIGNATURE_EXPIRY_SECONDS } from "./constants.ts";
import type {
	CodeReviewStatus,
	PermissionName,
	SecurityCheckResult,
	SecurityIssue,
	SecurityRiskLevel,
} from "./types.ts";

export interface ValidatorOptions {
	/** Current time in unix seconds (default: wall clock) */
	now?: () => number;
	signatureAlgorithm?: string;
	signatureExpirySeconds?: number;
}

const unixNow = () => Math.floor(Date.now() / 1000);

export class SecurityValidator {
	private readonly now: () => number;
	private readonly signatureAlgorithm: string;
	private readonly signatureExpirySeconds: number;

	constructor(options: ValidatorOptions = {}) {
		this.now = options.now ?? unixNow;
		this.signatureAlgorithm = options.signatureAlgorithm ?? DEFAULT_SIGNATURE_ALGORITHM;
		this.signatureExpirySeconds = options.signatureExpirySeconds ?? SIGNATURE_EXPIRY_SECONDS;
	}

	/**
	 * A signature passes when present, unexpired, made with the expected
	 * algorithm, and has a non-empty signature and public key.
	 */
	verifySignature(metadata: ModuleMetadata): boolean {
		const signature = metadata.security?.signature;
		if (!signature) {
			return false;
		}
		if (this.now() - signature.timestamp > this.signatureExpirySeconds) {
			return false;
		}
		if (signature.algorithm !== this.signatureAlgorithm) {
			return false;
		}
		return signature.signature.length > 0 && signature.publicKey.length > 0;
	}

	/**
	 * Whether the module was granted a permission. Modules without a
	 * security block hold no permissions.
	 */
	checkPermission(metadata: ModuleMetadata, permission: PermissionName): boolean {
		return metadata.security?.permissions[permission] ?? false;
	}

	isApproved(status: CodeReviewStatus): boolean {
		return status.state === "approved";
	}

	/**
	 * Supply chain info passes when it names a source and commit and was not
	 * built in the future.
	 */
	verifySupplyChain(metadata: ModuleMetadata): boolean {
		const chain = metadata.security?.supplyChain;
		if (!chain) {
			return false;
		}
		if (chain.sourceUrl.length === 0 || chain.commitHash.length === 0) {
			return false;
		}
		return chain.buildTimestamp <= this.now();
	}

	/**
	 * Run every check and collect issues.
	 */
	comprehensiveCheck(metadata: ModuleMetadata, review: CodeReviewStatus): SecurityCheckResult {
		const issues: SecurityIssue[] = [];

		if (!this.verifySignature(metadata)) {
			issues.push({
				severity: "high",
				message: "Module signature verification failed",
				component: "signature",
			});
		}

		if (!this.isApproved(review)) {
			issues.push({
				severity: "medium",
				message: "Module not approved by code review",
				component: "review",
			});
		}

		if (!this.verifySupplyChain(metadata)) {
			issues.push({
				severity: "medium",
				message: "Supply chain verification failed",
				component: "supply_chain",
			});
		}

		const security = metadata.security;
		if (security?.permissions.systemAccess && !security.sandbox.enabled) {
			issues.push({
				severity: "high",
				message: "System access granted without sandboxing",
				component: "permissions",
			});
		}

		return {
			isSecure: issues.length === 0,
			riskLevel: riskLevelOf(issues),
			issues,
			checkTimestamp: this.now(),
		};
	}
}

/**
 * Highest severity among the issues, or "none".
 */
export function riskLevelOf(issues: readonly SecurityIssue[]): SecurityRiskLevel {
	const order: SecurityRiskLevel[] = ["critical", "high", "medium", "low"];
	for (const level of order) {
		if (issues.some((issue) => issue.severity === level)) {
			return level;
		}
	}
	return "none";
}

/**
 * Whether a check result carries a medium or higher risk.
 */
export function hasSecurityRisk(result: SecurityCheckResult): boolean {
	return result.riskLevel === "medium" || result.riskLevel === "high" || result.riskLevel === "critical";
}
