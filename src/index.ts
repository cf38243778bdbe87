/**
 * apidoc-graph - identity resolution, cross-source merging and inheritance
 * for API documentation graphs
 */

export * from "./core/index.js";
export { createLogger, type Logger } from "./utils/logger.js";
export {
  BuildConfigSchema,
  loadConfig,
  parseConfig,
  type BuildConfig,
  type BuildConfigInput,
} from "./utils/validation.js";
