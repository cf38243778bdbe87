/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime, with TypeScript types
 * inferred from them.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import { isFieldName } from "../core/model/apidoc.js";
import { fileExists, readJsonFile } from "./fs.js";

// =============================================================================
// Build Configuration Schema
// =============================================================================

/**
 * Producer whose value wins a merge
 */
export const DocSourceSchema = z.enum(["inspect", "parse"]);

/**
 * How method resolution orders are computed
 */
export const MroStrategySchema = z.enum(["auto", "c3", "legacy"]);

const IDENTIFIER_PATH = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Build configuration schema
 */
export const BuildConfigSchema = z
  .object({
    /** Side that wins attributes the precedence table does not list */
    defaultPrecedence: DocSourceSchema.default("inspect"),

    /** Per-attribute precedence overrides, e.g. `{ "repr": "inspect" }` */
    precedence: z
      .record(z.string(), DocSourceSchema)
      .refine((table) => Object.keys(table).every(isFieldName), {
        message: "names an attribute no record kind declares",
      })
      .default({}),

    /** Dotted name of the class all new-style classes derive from */
    universalBase: z
      .string()
      .regex(IDENTIFIER_PATH, "must be a dotted identifier path")
      .default("object"),

    mroStrategy: MroStrategySchema.default("auto"),

    /** Propagate inherited members into classes */
    inherit: z.boolean().default(true),

    /** Compute sorted variables and groups */
    layout: z.boolean().default(true),
  })
  .strict();

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export type BuildConfigInput = z.input<typeof BuildConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  data: unknown
): ValidationResult<Output> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Validates in-memory configuration, filling in defaults.
 *
 * @throws {ConfigurationError} If validation fails
 */
export function parseConfig(value: unknown = {}): BuildConfig {
  const result = safeValidate(BuildConfigSchema, value);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid build configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Reads a JSON configuration file and validates it.
 *
 * @throws {ConfigurationError} If the file is missing, unreadable or invalid
 */
export async function loadConfig(filePath: string): Promise<BuildConfig> {
  if (!(await fileExists(filePath))) {
    throw new ConfigurationError(`Configuration file not found: ${filePath}`, { filePath });
  }
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }
  return parseConfig(raw);
}
