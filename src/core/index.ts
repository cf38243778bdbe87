/**
 * Core module - identity resolution, merging and inheritance over a DocGraph
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./names/index.js";
export * from "./model/index.js";
export * from "./diagnostics/index.js";
export * from "./indexer/index.js";
export * from "./merger/index.js";
export * from "./inheritance/index.js";
export * from "./layout/index.js";
export * from "./loader/index.js";
export * from "./builder/index.js";
export * from "./printer/index.js";

// Re-export types
export * from "../types/index.js";
