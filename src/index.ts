/**
 * monitor-fixtures: synthesis and transformation of monitor-configuration fixtures
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/endpoints/index.js";
export * from "./lib/allocator/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/walker/index.js";
export * from "./lib/replicator/index.js";
export * from "./lib/document/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/validator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
