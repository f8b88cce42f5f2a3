/**
 * Core exports.
 */

export * from "./registry/index.ts";
export * from "./security/index.ts";
export * from "./config.ts";
export * from "./selection.ts";
export * from "./logger.ts";
