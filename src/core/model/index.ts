/**
 * Entity model: record kinds, the Unknown sentinel and the DocGraph arena.
 *
 * @module
 */

export * from "./unknown.js";
export * from "./apidoc.js";
export * from "./doc-graph.js";
