/**
 * Validator module - structural and naming checks for monitor fixtures
 */
export * from "./types.js";
export * from "./monitor-schema.js";
export * from "./monitor-validator.js";
