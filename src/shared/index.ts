/**
 * Barrel exports for shared utilities
 */
export * from "./errors.js";
export * from "./correlation.js";
export * from "./handler.utils.js";
export * from "./keyed-lock.js";
