// Core re-exports for the fixture engine type system

export * from "./data-model.js";
export * from "./config.js";
