/**
 * Shared types
 */

export * from "./result.js";
