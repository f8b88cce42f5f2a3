/**
 * Security defaults applied to module metadata.
 */

export const DEFAULT_MEMORY_LIMIT_MB = 128;
export const DEFAULT_CPU_LIMIT_PERCENT = 50;
export const DEFAULT_TIMEOUT_SECONDS = 30;

export const SIGNATURE_EXPIRY_SECONDS = 365 * 24 * 60 * 60; // 1 year
export const DEFAULT_SIGNATURE_ALGORITHM = "SHA256-RSA";

export const DEFAULT_DENIED_PATHS: readonly string[] = ["/etc", "/usr/bin", "/bin"];
