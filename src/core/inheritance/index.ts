/**
 * Method resolution order and inherited member propagation.
 *
 * @module
 */

export * from "./mro.js";
export * from "./inheriter.js";
