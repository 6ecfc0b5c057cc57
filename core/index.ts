/**
 * Core module exports for alias-registry.
 */

export * from "./config.ts";
export * from "./logger.ts";
export * from "./placeholders.ts";
export * from "./loader.ts";

// Registry module - alias map and error types
export * from "./registry/index.ts";
