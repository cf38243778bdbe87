export * from "./dotted-name.js";
export * from "./unreachable-names.js";
