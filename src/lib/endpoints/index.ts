/**
 * Endpoint module - parsing and sourcing of endpoint lists
 */
export * from "./types.js";
export * from "./parser.js";
export * from "./source.js";
