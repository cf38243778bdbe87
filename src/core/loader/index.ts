/**
 * JSON graph documents: schemas and loading.
 *
 * @module
 */

export * from "./schema.js";
export * from "./graph-document.js";
