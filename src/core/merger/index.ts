/**
 * Merging of inspected and parsed documentation records.
 *
 * @module
 */

export * from "./precedence.js";
export * from "./doc-merger.js";
