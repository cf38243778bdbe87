/**
 * Graph Document Loader
 *
 * Loads serialized producer output into a DocGraph. Each loaded document
 * gets its own local-id namespace, so several documents (typically one
 * inspected and one parsed) can share a graph.
 *
 * @module
 */

import { DottedName } from "../names/dotted-name.js";
import { ErrorCode, GraphDocumentError, IdentifierSyntaxError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { readJsonFile } from "../../utils/fs.js";
import { formatZodError, safeValidate } from "../../utils/validation.js";
import {
  DocFieldsSchema,
  GraphDocumentSchema,
  type DocFields,
} from "./schema.js";
import {
  assertDeclaredFields,
  isVariableDoc,
  type DocGraph,
  type DocId,
  type DocKind,
  type FieldSeed,
} from "../model/index.js";

const logger = createLogger("graph-loader");

export interface LoadedDocument {
  /** Where the document came from, for messages */
  source: string;
  /** Top-level name -> root handle */
  roots: Map<string, DocId>;
  /** Local id -> handle */
  handles: Map<string, DocId>;
}

type ResolveRef = (localId: string, field: string) => DocId;

/**
 * Validates a parsed JSON value and adds its records to `graph`.
 *
 * @throws GraphDocumentError for a malformed document or dangling reference
 * @throws ConstructionError for a field the record's kind does not declare
 * @throws IdentifierSyntaxError for a malformed name
 */
export function parseGraphDocument(graph: DocGraph, input: unknown, source = "<memory>"): LoadedDocument {
  const document = safeValidate(GraphDocumentSchema, input);
  if (!document.success) {
    throw invalid(source, formatZodError(document.error));
  }

  const handles = new Map<string, DocId>();
  const pending: Array<{ localId: string; fields: DocFields }> = [];

  for (const [localId, entry] of Object.entries(document.data.docs)) {
    const { kind, ...encoded } = entry;
    assertDeclaredFields(kind, encoded);
    const fields = safeValidate(DocFieldsSchema, encoded);
    if (!fields.success) {
      throw invalid(
        source,
        formatZodError(fields.error).map((issue) => `docs.${localId}.${issue}`)
      );
    }
    handles.set(localId, allocate(graph, kind));
    pending.push({ localId, fields: fields.data });
  }

  for (const { localId, fields } of pending) {
    const resolveRef: ResolveRef = (target, field) => {
      const handle = handles.get(target);
      if (handle === undefined) {
        throw new GraphDocumentError(
          `Dangling reference in ${source}: docs.${localId}.${field} -> "${target}"`,
          ErrorCode.DOCUMENT_DANGLING_REFERENCE,
          { source, localId, field, target }
        );
      }
      return handle;
    };
    const handle = handles.get(localId);
    if (handle !== undefined) graph.populate(handle, decodeFields(fields, resolveRef));
  }

  const roots = new Map<string, DocId>();
  for (const [name, localId] of Object.entries(document.data.roots)) {
    const rootName = new DottedName(name);
    const handle = handles.get(localId);
    if (handle === undefined) {
      throw new GraphDocumentError(
        `Dangling root in ${source}: ${name} -> "${localId}"`,
        ErrorCode.DOCUMENT_DANGLING_REFERENCE,
        { source, root: name, target: localId }
      );
    }
    if (isVariableDoc(graph.get(handle))) {
      throw new GraphDocumentError(
        `Root ${name} in ${source} is a variable record; roots must be values`,
        ErrorCode.DOCUMENT_INVALID,
        { source, root: name }
      );
    }
    roots.set(rootName.key, handle);
  }

  logger.debug({ source, records: handles.size, roots: roots.size }, "Loaded graph document");
  return { source, roots, handles };
}

/**
 * Reads a graph document file into `graph`.
 */
export async function loadGraphDocument(graph: DocGraph, filePath: string): Promise<LoadedDocument> {
  let input: unknown;
  try {
    input = await readJsonFile(filePath);
  } catch (error) {
    throw new GraphDocumentError(
      `Cannot read graph document ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.DOCUMENT_READ_FAILED,
      { source: filePath }
    );
  }
  return parseGraphDocument(graph, input, filePath);
}

function allocate(graph: DocGraph, kind: DocKind): DocId {
  return graph.create(kind).id;
}

function invalid(source: string, issues: string[]): GraphDocumentError {
  return new GraphDocumentError(
    `Invalid graph document ${source}: ${issues.join("; ")}`,
    ErrorCode.DOCUMENT_INVALID,
    { source, issues }
  );
}

function decodeName(text: string | null): DottedName | null {
  return text === null ? null : new DottedName(text);
}

function decodeMap(encoded: Record<string, string>, field: string, resolveRef: ResolveRef): Map<string, DocId> {
  return new Map(
    Object.entries(encoded).map(([key, target]): [string, DocId] => [
      key,
      resolveRef(target, `${field}.${key}`),
    ])
  );
}

/**
 * Turns encoded fields into record fields: local ids become handles, dotted
 * name strings become DottedNames, objects become Maps.
 */
function decodeFields(fields: DocFields, resolveRef: ResolveRef): FieldSeed {
  const {
    container,
    value,
    overrides,
    canonicalContainer,
    package: pkg,
    fget,
    fset,
    fdel,
    canonicalName,
    importedFrom,
    variables,
    localVariables,
    sortedVariables,
    submodules,
    bases,
    subclasses,
    posargDefaults,
    groups,
    argTypes,
    ...plain
  } = fields;

  if (plain.name !== undefined && !DottedName.isIdentifier(plain.name)) {
    throw new IdentifierSyntaxError(`Bad variable name "${plain.name}"`, ErrorCode.IDENTIFIER_SYNTAX, {
      identifier: plain.name,
    });
  }

  const seed: FieldSeed = { ...plain };
  const ref = (target: string | null, field: string): DocId | null =>
    target === null ? null : resolveRef(target, field);
  const refs = (targets: string[], field: string): DocId[] =>
    targets.map((target, i) => resolveRef(target, `${field}[${i}]`));

  if (container !== undefined) seed.container = ref(container, "container");
  if (value !== undefined) seed.value = ref(value, "value");
  if (overrides !== undefined) seed.overrides = ref(overrides, "overrides");
  if (canonicalContainer !== undefined) seed.canonicalContainer = ref(canonicalContainer, "canonicalContainer");
  if (pkg !== undefined) seed.package = ref(pkg, "package");
  if (fget !== undefined) seed.fget = ref(fget, "fget");
  if (fset !== undefined) seed.fset = ref(fset, "fset");
  if (fdel !== undefined) seed.fdel = ref(fdel, "fdel");

  if (canonicalName !== undefined) seed.canonicalName = decodeName(canonicalName);
  if (importedFrom !== undefined) seed.importedFrom = decodeName(importedFrom);

  if (variables !== undefined) seed.variables = decodeMap(variables, "variables", resolveRef);
  if (localVariables !== undefined) {
    seed.localVariables = decodeMap(localVariables, "localVariables", resolveRef);
  }
  if (sortedVariables !== undefined) seed.sortedVariables = refs(sortedVariables, "sortedVariables");
  if (submodules !== undefined) seed.submodules = refs(submodules, "submodules");
  if (bases !== undefined) seed.bases = refs(bases, "bases");
  if (subclasses !== undefined) seed.subclasses = refs(subclasses, "subclasses");
  if (posargDefaults !== undefined) {
    seed.posargDefaults = posargDefaults.map((target, i) => ref(target, `posargDefaults[${i}]`));
  }
  if (groups !== undefined) {
    seed.groups = new Map(
      Object.entries(groups).map(([group, members]): [string, DocId[]] => [
        group,
        refs(members, `groups.${group}`),
      ])
    );
  }
  if (argTypes !== undefined) seed.argTypes = new Map(Object.entries(argTypes));

  return seed;
}
