/**
 * Emitter module - serializes and writes transformed documents
 */
export * from "./types.js";
export * from "./document-writer.js";
