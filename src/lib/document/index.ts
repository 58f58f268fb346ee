/**
 * Document module - reading configuration documents
 */
export * from "./loader.js";
