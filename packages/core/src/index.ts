// Persistence boundary
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, FiscusErrorCode, FiscusErrorOptions, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, FiscusError } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
