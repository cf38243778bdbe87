/**
 * Graph Document Schemas
 *
 * A graph document is a JSON object:
 *
 * ```json
 * {
 *   "roots": { "pkg": "m1" },
 *   "docs": {
 *     "m1": { "kind": "module", "variables": { "f": "v1" } },
 *     "v1": { "kind": "variable", "name": "f", "value": "f1" },
 *     "f1": { "kind": "function", "posargs": ["x"] }
 *   }
 * }
 * ```
 *
 * Records refer to each other by local id. An absent field is UNKNOWN; an
 * explicit `null` is a known absence.
 *
 * @module
 */

import { z } from "zod";

const LocalIdSchema = z.string().min(1);
const NullableLocalIdSchema = LocalIdSchema.nullable();
const TextSchema = z.string().nullable();
const DottedNameTextSchema = z.string().nullable();
const LocalIdMapSchema = z.record(z.string(), LocalIdSchema);

export const DocKindSchema = z.enum([
  "variable",
  "value",
  "namespace",
  "module",
  "class",
  "property",
  "routine",
  "function",
  "instancemethod",
  "classmethod",
  "staticmethod",
]);

/**
 * Field encodings of a serialized record (every field optional)
 */
export const DocFieldsSchema = z
  .object({
    docstring: TextSchema,
    descr: TextSchema,
    summary: TextSchema,
    metadata: z.array(
      z.object({
        tag: z.string(),
        arg: z.string().nullable().default(null),
        body: z.string(),
      })
    ),

    container: NullableLocalIdSchema,
    name: z.string(),
    value: NullableLocalIdSchema,
    isImported: z.boolean(),
    isInstvar: z.boolean(),
    isAlias: z.boolean(),
    isPublic: z.boolean(),
    overrides: NullableLocalIdSchema,
    typeDescr: TextSchema,

    canonicalName: DottedNameTextSchema,
    canonicalContainer: NullableLocalIdSchema,
    importedFrom: DottedNameTextSchema,
    /** Raw value identity; equal refs denote the same runtime value */
    rawValue: z
      .object({
        ref: z.union([z.string(), z.number(), z.boolean()]),
        name: z.string().optional(),
      })
      .nullable(),
    repr: TextSchema,

    variables: LocalIdMapSchema,
    sortedVariables: z.array(LocalIdSchema),
    sortSpec: z.array(z.string()),
    groupSpecs: z.array(z.tuple([z.string(), z.array(z.string())])),
    groups: z.record(z.string(), z.array(LocalIdSchema)),
    groupNames: z.array(z.string()),

    package: NullableLocalIdSchema,
    docformat: TextSchema,
    submodules: z.array(LocalIdSchema),
    isPackage: z.boolean(),
    filename: TextSchema,

    localVariables: LocalIdMapSchema,
    bases: z.array(LocalIdSchema),
    subclasses: z.array(LocalIdSchema),

    posargs: z.array(z.string()),
    posargDefaults: z.array(NullableLocalIdSchema),
    vararg: TextSchema,
    kwarg: TextSchema,
    argDescrs: z.array(z.object({ names: z.array(z.string()), descr: z.string() })),
    argTypes: z.record(z.string(), z.string()),
    returnDescr: TextSchema,
    returnType: TextSchema,
    exceptionDescrs: z.array(z.object({ name: z.string(), descr: z.string() })),

    fget: NullableLocalIdSchema,
    fset: NullableLocalIdSchema,
    fdel: NullableLocalIdSchema,
  })
  .partial()
  .strict();

export type DocFields = z.infer<typeof DocFieldsSchema>;

/**
 * A record entry: its kind plus any encoded fields (checked separately)
 */
export const DocEntrySchema = z.object({ kind: DocKindSchema }).passthrough();

export const GraphDocumentSchema = z.object({
  /** Top-level dotted name -> local id */
  roots: z.record(z.string(), LocalIdSchema),
  /** Local id -> record */
  docs: z.record(z.string(), DocEntrySchema),
});

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;
