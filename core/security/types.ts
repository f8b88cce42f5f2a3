/**
 * Security metadata schemas.
 * Modules may declare a signature, permissions, supply chain provenance and
 * sandbox settings alongside their registration.
 */

import { z } from "zod";
import {
	DEFAULT_CPU_LIMIT_PERCENT,
	DEFAULT_DENIED_PATHS,
	DEFAULT_MEMORY_LIMIT_MB,
	DEFAULT_TIMEOUT_SECONDS,
} from "./constants.ts";

// ============================================================================
// Metadata Schemas
// ============================================================================

export const ModuleSignatureSchema = z.object({
	/** SHA-256 hash of the module code */
	codeHash: z.string(),
	signature: z.string(),
	publicKey: z.string(),
	/** Unix seconds */
	timestamp: z.number().int().nonnegative(),
	algorithm: z.string(),
});

export const ModulePermissionsSchema = z.object({
	filesystemAccess: z.boolean().default(false),
	networkAccess: z.boolean().default(false),
	processSpawn: z.boolean().default(false),
	envAccess: z.boolean().default(false),
	systemAccess: z.boolean().default(false),
	memoryLimitMb: z.number().int().positive().default(DEFAULT_MEMORY_LIMIT_MB),
	cpuLimitPercent: z.number().int().min(1).max(100).default(DEFAULT_CPU_LIMIT_PERCENT),
	timeoutSeconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
});

export const SupplyChainInfoSchema = z.object({
	sourceUrl: z.string(),
	commitHash: z.string(),
	/** Unix seconds */
	buildTimestamp: z.number().int().nonnegative(),
	dependencies: z.record(z.string(), z.string()).default({}),
	buildEnvironment: z.string().default(""),
	verifierSignature: z.string().optional(),
});

export const SandboxConfigSchema = z.object({
	enabled: z.boolean().default(true),
	filesystemIsolation: z.boolean().default(true),
	networkIsolation: z.boolean().default(true),
	processIsolation: z.boolean().default(true),
	readOnlyFs: z.boolean().default(true),
	allowedPaths: z.array(z.string()).default([]),
	deniedPaths: z.array(z.string()).default([...DEFAULT_DENIED_PATHS]),
});

export const ModuleSecuritySchema = z.object({
	signature: ModuleSignatureSchema.optional(),
	permissions: ModulePermissionsSchema.default({}),
	supplyChain: SupplyChainInfoSchema.optional(),
	sandbox: SandboxConfigSchema.default({}),
});

export type ModuleSignature = z.infer<typeof ModuleSignatureSchema>;
export type ModulePermissions = z.infer<typeof ModulePermissionsSchema>;
export type SupplyChainInfo = z.infer<typeof SupplyChainInfoSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type ModuleSecurity = z.infer<typeof ModuleSecuritySchema>;
/** Security block as accepted at registration, before defaults are applied */
export type ModuleSecurityInput = z.input<typeof ModuleSecuritySchema>;

/**
 * Boolean permission flags a policy can ask about.
 */
export type PermissionName =
	| "filesystemAccess"
	| "networkAccess"
	| "processSpawn"
	| "envAccess"
	| "systemAccess";

// ============================================================================
// Review & Audit Types
// ============================================================================

export type CodeReviewStatus =
	| { state: "pending" }
	| { state: "in_progress" }
	| { state: "approved"; reviewer: string; timestamp: number }
	| { state: "rejected"; reviewer: string; reason: string; timestamp: number };

export type SecuritySeverity = "low" | "medium" | "high" | "critical";

export type SecurityRiskLevel = "none" | SecuritySeverity;

export interface SecurityIssue {
	severity: SecuritySeverity;
	message: string;
	component: string;
}

export interface SecurityCheckResult {
	isSecure: boolean;
	riskLevel: SecurityRiskLevel;
	issues: SecurityIssue[];
	/** Unix seconds */
	checkTimestamp: number;
}

export interface SecurityReport {
	name: string;
	hasSignature: boolean;
	signatureVerified: boolean;
	isApproved: boolean;
	hasSupplyChain: boolean;
	supplyChainVerified: boolean;
	permissions: ModulePermissions;
	sandboxEnabled: boolean;
}
