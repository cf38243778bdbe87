/**
 * API Documentation Records
 *
 * Closed set of record kinds describing one documented program entity each.
 * Every field is `Maybe<...>` and starts out UNKNOWN. References to other
 * records are `DocId` handles into a DocGraph, never direct object pointers,
 * so that merging and specialization can swap the record behind a handle.
 *
 * @module
 */

import type { DottedName } from "../names/dotted-name.js";
import { ConstructionError, ErrorCode } from "../errors.js";
import { isKnown, orUnknown, type Maybe } from "./unknown.js";

// =============================================================================
// Handles & Kinds
// =============================================================================

/**
 * Stable handle of a record inside a DocGraph
 */
export type DocId = string;

/**
 * The two producers whose graphs get merged
 */
export type DocSource = "inspect" | "parse";

export type RoutineKind = "routine" | "function" | "instancemethod" | "classmethod" | "staticmethod";

export type ValueKind = "value" | "namespace" | "module" | "class" | "property" | RoutineKind;

export type DocKind = "variable" | ValueKind;

const KIND_PARENT: Record<DocKind, DocKind | null> = {
  variable: null,
  value: null,
  namespace: "value",
  module: "namespace",
  class: "namespace",
  property: "value",
  routine: "value",
  function: "routine",
  instancemethod: "routine",
  classmethod: "routine",
  staticmethod: "routine",
};

export const DOC_KINDS: readonly DocKind[] = Object.keys(KIND_PARENT).filter(isDocKind);

export function isDocKind(value: string): value is DocKind {
  return Object.prototype.hasOwnProperty.call(KIND_PARENT, value);
}

/**
 * True if `kind` is `ancestor` or a more specific kind of it.
 */
export function isSubkind(kind: DocKind, ancestor: DocKind): boolean {
  let current: DocKind | null = kind;
  while (current !== null) {
    if (current === ancestor) return true;
    current = KIND_PARENT[current];
  }
  return false;
}

export function areRelatedKinds(a: DocKind, b: DocKind): boolean {
  return isSubkind(a, b) || isSubkind(b, a);
}

// =============================================================================
// Field Groups
// =============================================================================

/**
 * A `@tag arg: body` field lifted out of a docstring
 */
export interface MetadataEntry {
  tag: string;
  arg: string | null;
  body: string;
}

/**
 * Opaque handle to the runtime object an inspector looked at
 */
export interface RawValue {
  /** Identity of the runtime value; two handles denote the same value iff refs are identical */
  readonly ref: unknown;
  /** Short name the producer reported for the value, if any */
  readonly name?: string;
}

export interface ArgDescr {
  /** Parameter names sharing this description */
  names: string[];
  descr: string;
}

export interface ExceptionDescr {
  name: string;
  descr: string;
}

/** Group name and the member names or `*` patterns it collects */
export type GroupSpec = [string, string[]];

export type VariableMap = Map<string, DocId>;

export interface APIDocFields {
  /** Raw docstring text */
  docstring: Maybe<string | null>;
  /** Description, as produced by the docstring parser */
  descr: Maybe<string | null>;
  /** One-line summary */
  summary: Maybe<string | null>;
  metadata: Maybe<MetadataEntry[]>;
}

export interface VariableFields {
  /** Namespace that owns this variable */
  container: Maybe<DocId | null>;
  name: Maybe<string>;
  /** Value held by the variable; many variables may share one value */
  value: Maybe<DocId | null>;
  isImported: Maybe<boolean>;
  isInstvar: Maybe<boolean>;
  isAlias: Maybe<boolean>;
  isPublic: Maybe<boolean>;
  /** Inherited variable this one shadows (back-reference) */
  overrides: Maybe<DocId | null>;
  typeDescr: Maybe<string | null>;
}

export interface ValueFields {
  canonicalName: Maybe<DottedName | null>;
  /** Value named by `canonicalName.container()` (back-reference) */
  canonicalContainer: Maybe<DocId | null>;
  /** Name of the real value, when this record is only an alias proxy */
  importedFrom: Maybe<DottedName | null>;
  rawValue: Maybe<RawValue | null>;
  /** Textual fallback representation */
  repr: Maybe<string | null>;
}

export interface NamespaceFields {
  /** All names defined by the namespace, including inherited and imported ones */
  variables: Maybe<VariableMap>;
  sortedVariables: Maybe<DocId[]>;
  sortSpec: Maybe<string[]>;
  groupSpecs: Maybe<GroupSpec[]>;
  groups: Maybe<Map<string, DocId[]>>;
  groupNames: Maybe<string[]>;
}

export interface ModuleFields {
  package: Maybe<DocId | null>;
  docformat: Maybe<string | null>;
  submodules: Maybe<DocId[]>;
  isPackage: Maybe<boolean>;
  filename: Maybe<string | null>;
}

export interface ClassFields {
  /** Variables declared directly in the class body */
  localVariables: Maybe<VariableMap>;
  bases: Maybe<DocId[]>;
  /** Known subclasses (back-references) */
  subclasses: Maybe<DocId[]>;
}

export interface RoutineFields {
  posargs: Maybe<string[]>;
  /** Default values aligned with `posargs`; null where a parameter has none */
  posargDefaults: Maybe<Array<DocId | null>>;
  vararg: Maybe<string | null>;
  kwarg: Maybe<string | null>;
  argDescrs: Maybe<ArgDescr[]>;
  argTypes: Maybe<Map<string, string>>;
  returnDescr: Maybe<string | null>;
  returnType: Maybe<string | null>;
  exceptionDescrs: Maybe<ExceptionDescr[]>;
}

export interface PropertyFields {
  fget: Maybe<DocId | null>;
  fset: Maybe<DocId | null>;
  fdel: Maybe<DocId | null>;
}

// =============================================================================
// Records
// =============================================================================

interface RecordBase {
  readonly id: DocId;
}

export interface VariableDoc extends RecordBase, APIDocFields, VariableFields {
  readonly kind: "variable";
}

export interface GenericValueDoc extends RecordBase, APIDocFields, ValueFields {
  readonly kind: "value";
}

export interface GenericNamespaceDoc extends RecordBase, APIDocFields, ValueFields, NamespaceFields {
  readonly kind: "namespace";
}

export interface ModuleDoc
  extends RecordBase,
    APIDocFields,
    ValueFields,
    NamespaceFields,
    ModuleFields {
  readonly kind: "module";
}

export interface ClassDoc
  extends RecordBase,
    APIDocFields,
    ValueFields,
    NamespaceFields,
    ClassFields {
  readonly kind: "class";
}

export interface RoutineDoc extends RecordBase, APIDocFields, ValueFields, RoutineFields {
  readonly kind: RoutineKind;
}

export interface PropertyDoc extends RecordBase, APIDocFields, ValueFields, PropertyFields {
  readonly kind: "property";
}

export type NamespaceDoc = GenericNamespaceDoc | ModuleDoc | ClassDoc;

export type ValueDoc = GenericValueDoc | NamespaceDoc | RoutineDoc | PropertyDoc;

export type APIDoc = VariableDoc | ValueDoc;

// =============================================================================
// Initializers
// =============================================================================

export type VariableInit = Partial<APIDocFields & VariableFields>;
export type ValueInit = Partial<APIDocFields & ValueFields>;
export type NamespaceInit = ValueInit & Partial<NamespaceFields>;
export type ModuleInit = NamespaceInit & Partial<ModuleFields>;
export type ClassInit = NamespaceInit & Partial<ClassFields>;
export type RoutineInit = ValueInit & Partial<RoutineFields>;
export type PropertyInit = ValueInit & Partial<PropertyFields>;

/**
 * Any combination of declared fields; builders read only what their kind declares.
 */
export type FieldSeed = VariableInit & ModuleInit & ClassInit & RoutineInit & PropertyInit;

export type FieldName = keyof FieldSeed;

const COMMON_FIELDS = ["docstring", "descr", "summary", "metadata"] as const satisfies readonly (keyof APIDocFields)[];

const VARIABLE_FIELDS = [
  "container",
  "name",
  "value",
  "isImported",
  "isInstvar",
  "isAlias",
  "isPublic",
  "overrides",
  "typeDescr",
] as const satisfies readonly (keyof VariableFields)[];

const VALUE_FIELDS = [
  "canonicalName",
  "canonicalContainer",
  "importedFrom",
  "rawValue",
  "repr",
] as const satisfies readonly (keyof ValueFields)[];

const NAMESPACE_FIELDS = [
  "variables",
  "sortedVariables",
  "sortSpec",
  "groupSpecs",
  "groups",
  "groupNames",
] as const satisfies readonly (keyof NamespaceFields)[];

const MODULE_FIELDS = [
  "package",
  "docformat",
  "submodules",
  "isPackage",
  "filename",
] as const satisfies readonly (keyof ModuleFields)[];

const CLASS_FIELDS = ["localVariables", "bases", "subclasses"] as const satisfies readonly (keyof ClassFields)[];

const ROUTINE_FIELDS = [
  "posargs",
  "posargDefaults",
  "vararg",
  "kwarg",
  "argDescrs",
  "argTypes",
  "returnDescr",
  "returnType",
  "exceptionDescrs",
] as const satisfies readonly (keyof RoutineFields)[];

const PROPERTY_FIELDS = ["fget", "fset", "fdel"] as const satisfies readonly (keyof PropertyFields)[];

const ROUTINE_DECLARED: readonly FieldName[] = [...COMMON_FIELDS, ...VALUE_FIELDS, ...ROUTINE_FIELDS];
const NAMESPACE_DECLARED: readonly FieldName[] = [...COMMON_FIELDS, ...VALUE_FIELDS, ...NAMESPACE_FIELDS];

/**
 * Attribute set declared by each kind
 */
export const DECLARED_FIELDS: Record<DocKind, readonly FieldName[]> = {
  variable: [...COMMON_FIELDS, ...VARIABLE_FIELDS],
  value: [...COMMON_FIELDS, ...VALUE_FIELDS],
  namespace: NAMESPACE_DECLARED,
  module: [...NAMESPACE_DECLARED, ...MODULE_FIELDS],
  class: [...NAMESPACE_DECLARED, ...CLASS_FIELDS],
  property: [...COMMON_FIELDS, ...VALUE_FIELDS, ...PROPERTY_FIELDS],
  routine: ROUTINE_DECLARED,
  function: ROUTINE_DECLARED,
  instancemethod: ROUTINE_DECLARED,
  classmethod: ROUTINE_DECLARED,
  staticmethod: ROUTINE_DECLARED,
};

export function isDeclaredField(kind: DocKind, field: string): field is FieldName {
  return DECLARED_FIELDS[kind].some((declared) => declared === field);
}

/**
 * True if some kind declares `name`.
 */
export function isFieldName(name: string): name is FieldName {
  return DOC_KINDS.some((kind) => isDeclaredField(kind, name));
}

/**
 * Throws ConstructionError for the first key `kind` does not declare.
 */
export function assertDeclaredFields(kind: DocKind, init: object): void {
  for (const key of Object.keys(init)) {
    if (!isDeclaredField(kind, key)) {
      throw new ConstructionError(
        `Attribute "${key}" is not declared for ${kind} records`,
        ErrorCode.UNDECLARED_ATTRIBUTE,
        { kind, attribute: key }
      );
    }
  }
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Public unless the name starts with `_` without also ending in `_`.
 */
export function isPublicName(name: string): boolean {
  return !(name.startsWith("_") && !name.endsWith("_"));
}

function commonFields(seed: FieldSeed): APIDocFields {
  return {
    docstring: orUnknown(seed.docstring),
    descr: orUnknown(seed.descr),
    summary: orUnknown(seed.summary),
    metadata: orUnknown(seed.metadata),
  };
}

function valueFields(seed: FieldSeed): ValueFields {
  return {
    canonicalName: orUnknown(seed.canonicalName),
    canonicalContainer: orUnknown(seed.canonicalContainer),
    importedFrom: orUnknown(seed.importedFrom),
    rawValue: orUnknown(seed.rawValue),
    repr: orUnknown(seed.repr),
  };
}

function namespaceFields(seed: FieldSeed): NamespaceFields {
  return {
    variables: orUnknown(seed.variables),
    sortedVariables: orUnknown(seed.sortedVariables),
    sortSpec: orUnknown(seed.sortSpec),
    groupSpecs: orUnknown(seed.groupSpecs),
    groups: orUnknown(seed.groups),
    groupNames: orUnknown(seed.groupNames),
  };
}

function routineFields(seed: FieldSeed): RoutineFields {
  return {
    posargs: orUnknown(seed.posargs),
    posargDefaults: orUnknown(seed.posargDefaults),
    vararg: orUnknown(seed.vararg),
    kwarg: orUnknown(seed.kwarg),
    argDescrs: orUnknown(seed.argDescrs),
    argTypes: orUnknown(seed.argTypes),
    returnDescr: orUnknown(seed.returnDescr),
    returnType: orUnknown(seed.returnType),
    exceptionDescrs: orUnknown(seed.exceptionDescrs),
  };
}

export function buildVariable(id: DocId, seed: FieldSeed): VariableDoc {
  const name: Maybe<string> = orUnknown(seed.name);
  let isPublic = orUnknown(seed.isPublic);
  if (!isKnown(isPublic) && isKnown(name)) {
    isPublic = isPublicName(name);
  }
  return {
    id,
    kind: "variable",
    ...commonFields(seed),
    container: orUnknown(seed.container),
    name,
    value: orUnknown(seed.value),
    isImported: orUnknown(seed.isImported),
    isInstvar: orUnknown(seed.isInstvar),
    isAlias: orUnknown(seed.isAlias),
    isPublic,
    overrides: orUnknown(seed.overrides),
    typeDescr: orUnknown(seed.typeDescr),
  };
}

export function buildValue(kind: ValueKind, id: DocId, seed: FieldSeed): ValueDoc {
  const base = { id, ...commonFields(seed), ...valueFields(seed) };
  switch (kind) {
    case "value":
      return { ...base, kind };
    case "namespace":
      return { ...base, ...namespaceFields(seed), kind };
    case "module":
      return {
        ...base,
        ...namespaceFields(seed),
        kind,
        package: orUnknown(seed.package),
        docformat: orUnknown(seed.docformat),
        submodules: orUnknown(seed.submodules),
        isPackage: orUnknown(seed.isPackage),
        filename: orUnknown(seed.filename),
      };
    case "class":
      return {
        ...base,
        ...namespaceFields(seed),
        kind,
        localVariables: orUnknown(seed.localVariables),
        bases: orUnknown(seed.bases),
        subclasses: orUnknown(seed.subclasses),
      };
    case "property":
      return {
        ...base,
        kind,
        fget: orUnknown(seed.fget),
        fset: orUnknown(seed.fset),
        fdel: orUnknown(seed.fdel),
      };
    case "routine":
    case "function":
    case "instancemethod":
    case "classmethod":
    case "staticmethod":
      return { ...base, ...routineFields(seed), kind };
  }
}

export function buildRecord(kind: DocKind, id: DocId, seed: FieldSeed): APIDoc {
  return kind === "variable" ? buildVariable(id, seed) : buildValue(kind, id, seed);
}

// =============================================================================
// Type Guards
// =============================================================================

export function isVariableDoc(doc: APIDoc): doc is VariableDoc {
  return doc.kind === "variable";
}

export function isValueDoc(doc: APIDoc): doc is ValueDoc {
  return doc.kind !== "variable";
}

export function isNamespaceDoc(doc: APIDoc): doc is NamespaceDoc {
  return doc.kind === "namespace" || doc.kind === "module" || doc.kind === "class";
}

export function isModuleDoc(doc: APIDoc): doc is ModuleDoc {
  return doc.kind === "module";
}

export function isClassDoc(doc: APIDoc): doc is ClassDoc {
  return doc.kind === "class";
}

export function isRoutineDoc(doc: APIDoc): doc is RoutineDoc {
  return isSubkind(doc.kind, "routine");
}

export function isPropertyDoc(doc: APIDoc): doc is PropertyDoc {
  return doc.kind === "property";
}

/**
 * Known, non-null canonical name, else null.
 */
export function canonicalNameOf(doc: ValueDoc): DottedName | null {
  return isKnown(doc.canonicalName) ? doc.canonicalName : null;
}

/**
 * `[name, variable]` entries a value exposes: its `variables`, then any class
 * `localVariables` not already listed. Empty for non-namespaces.
 */
export function variableEntries(doc: ValueDoc): Array<[string, DocId]> {
  if (!isNamespaceDoc(doc)) return [];
  const entries: Array<[string, DocId]> = isKnown(doc.variables) ? [...doc.variables] : [];
  if (isClassDoc(doc) && isKnown(doc.localVariables)) {
    const listed = new Set(entries.map(([name]) => name));
    for (const entry of doc.localVariables) {
      if (!listed.has(entry[0])) entries.push(entry);
    }
  }
  return entries;
}
