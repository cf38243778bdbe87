export * from "./doc-builder.js";
