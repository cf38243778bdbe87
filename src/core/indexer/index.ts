/**
 * Canonical naming, alias resolution and name lookup over a documentation graph.
 *
 * @module
 */

export * from "./doc-index.js";
