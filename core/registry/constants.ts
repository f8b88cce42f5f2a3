/**
 * Registry limits.
 */

export const MAX_MODULE_NAME_LENGTH = 256;
export const MAX_MODULE_TYPE_LENGTH = 128;
export const MAX_PATH_LENGTH = 4096;

export const DEFAULT_STRUCT_NAME = "Module";
export const DEFAULT_MODULE_PATH = "unknown";
export const DEFAULT_INSTANTIATE_FN = "factory";
