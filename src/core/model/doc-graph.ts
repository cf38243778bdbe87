/**
 * DocGraph
 *
 * Arena that owns every record of one build. Records refer to each other
 * through `DocId` handles; the graph resolves a handle to the record that
 * currently stands behind it.
 *
 * Two operations rebind handles:
 * - `specialize` replaces a record with one of a more specific kind under
 *   the same handle, carrying every field over.
 * - `join` makes two handles resolve to one shared record, so a later write
 *   through either handle is visible through the other.
 *
 * @module
 */

import { ConstructionError, ErrorCode } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import {
  assertDeclaredFields,
  buildRecord,
  buildValue,
  buildVariable,
  isClassDoc,
  isModuleDoc,
  isNamespaceDoc,
  isPropertyDoc,
  isRoutineDoc,
  isSubkind,
  isValueDoc,
  isVariableDoc,
  type APIDoc,
  type ClassDoc,
  type ClassInit,
  type DocId,
  type DocKind,
  type FieldSeed,
  type GenericNamespaceDoc,
  type GenericValueDoc,
  type ModuleDoc,
  type ModuleInit,
  type NamespaceDoc,
  type NamespaceInit,
  type PropertyDoc,
  type PropertyInit,
  type RoutineDoc,
  type RoutineInit,
  type RoutineKind,
  type ValueDoc,
  type ValueInit,
  type ValueKind,
  type VariableDoc,
  type VariableInit,
} from "./apidoc.js";

const logger = createLogger("doc-graph");

export class DocGraph {
  private readonly records = new Map<DocId, APIDoc>();
  private readonly forward = new Map<DocId, DocId>();
  private counter = 0;

  // ===========================================================================
  // Creation
  // ===========================================================================

  createVariable(init: VariableInit = {}): VariableDoc {
    assertDeclaredFields("variable", init);
    return this.insert(buildVariable(this.nextId(), init));
  }

  createValue(init: ValueInit = {}): GenericValueDoc {
    const record = this.createKind("value", init);
    if (record.kind !== "value") throw wrongKind(record, "value");
    return record;
  }

  createNamespace(init: NamespaceInit = {}): GenericNamespaceDoc {
    const record = this.createKind("namespace", init);
    if (record.kind !== "namespace") throw wrongKind(record, "namespace");
    return record;
  }

  createModule(init: ModuleInit = {}): ModuleDoc {
    const record = this.createKind("module", init);
    if (!isModuleDoc(record)) throw wrongKind(record, "module");
    return record;
  }

  createClass(init: ClassInit = {}): ClassDoc {
    const record = this.createKind("class", init);
    if (!isClassDoc(record)) throw wrongKind(record, "class");
    return record;
  }

  createRoutine(init: RoutineInit = {}, kind: RoutineKind = "routine"): RoutineDoc {
    const record = this.createKind(kind, init);
    if (!isRoutineDoc(record)) throw wrongKind(record, kind);
    return record;
  }

  createProperty(init: PropertyInit = {}): PropertyDoc {
    const record = this.createKind("property", init);
    if (!isPropertyDoc(record)) throw wrongKind(record, "property");
    return record;
  }

  /**
   * Creates a record of any kind. Every key of `init` must be declared by
   * `kind`, otherwise ConstructionError.
   */
  create(kind: DocKind, init: FieldSeed = {}): APIDoc {
    assertDeclaredFields(kind, init);
    return this.insert(buildRecord(kind, this.nextId(), init));
  }

  private createKind(kind: ValueKind, init: FieldSeed): ValueDoc {
    assertDeclaredFields(kind, init);
    return this.insert(buildValue(kind, this.nextId(), init));
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /**
   * Follows join redirections to the handle that owns the record.
   */
  resolve(id: DocId): DocId {
    let current = id;
    let next = this.forward.get(current);
    while (next !== undefined) {
      current = next;
      next = this.forward.get(current);
    }
    if (current !== id) this.forward.set(id, current);
    if (!this.records.has(current)) {
      throw new ConstructionError(`Unknown record handle "${id}"`, ErrorCode.UNKNOWN_HANDLE);
    }
    return current;
  }

  has(id: DocId): boolean {
    let current = id;
    let next = this.forward.get(current);
    while (next !== undefined) {
      current = next;
      next = this.forward.get(current);
    }
    return this.records.has(current);
  }

  get(id: DocId): APIDoc {
    const record = this.records.get(this.resolve(id));
    if (!record) {
      throw new ConstructionError(`Unknown record handle "${id}"`, ErrorCode.UNKNOWN_HANDLE);
    }
    return record;
  }

  getVariable(id: DocId): VariableDoc {
    const record = this.get(id);
    if (!isVariableDoc(record)) throw wrongKind(record, "variable");
    return record;
  }

  getValue(id: DocId): ValueDoc {
    const record = this.get(id);
    if (!isValueDoc(record)) throw wrongKind(record, "value");
    return record;
  }

  getNamespace(id: DocId): NamespaceDoc {
    const record = this.get(id);
    if (!isNamespaceDoc(record)) throw wrongKind(record, "namespace");
    return record;
  }

  getClass(id: DocId): ClassDoc {
    const record = this.get(id);
    if (!isClassDoc(record)) throw wrongKind(record, "class");
    return record;
  }

  getModule(id: DocId): ModuleDoc {
    const record = this.get(id);
    if (!isModuleDoc(record)) throw wrongKind(record, "module");
    return record;
  }

  /**
   * True if both handles resolve to one shared record.
   */
  same(a: DocId, b: DocId): boolean {
    return this.resolve(a) === this.resolve(b);
  }

  /** Live records, one per distinct entity. */
  values(): IterableIterator<APIDoc> {
    return this.records.values();
  }

  get size(): number {
    return this.records.size;
  }

  // ===========================================================================
  // Rebinding
  // ===========================================================================

  /**
   * Replaces the record behind `id` with one of the more specific `kind`,
   * keeping every field. A no-op when the record already has that kind.
   *
   * @throws ConstructionError if `kind` is not a subkind of the current kind
   */
  specialize(id: DocId, kind: ValueKind): ValueDoc {
    const current = this.getValue(id);
    if (current.kind === kind) return current;
    if (!isSubkind(kind, current.kind)) {
      throw new ConstructionError(
        `Cannot specialize ${current.kind} record to ${kind}`,
        ErrorCode.INVALID_SPECIALIZATION,
        { kind }
      );
    }
    const replacement = Object.seal(buildValue(kind, current.id, current));
    this.records.set(current.id, replacement);
    logger.trace({ id: current.id, from: current.kind, to: kind }, "Specialized record");
    return replacement;
  }

  /**
   * Rebuilds the record behind `id` from `seed`, keeping its kind. Fields the
   * seed omits become UNKNOWN. Used to fill records whose handles had to
   * exist before their references could be resolved.
   */
  populate(id: DocId, seed: FieldSeed): APIDoc {
    const current = this.get(id);
    assertDeclaredFields(current.kind, seed);
    const replacement = Object.seal(buildRecord(current.kind, current.id, seed));
    this.records.set(current.id, replacement);
    return replacement;
  }

  /**
   * Makes `drop` an alias of `keep`: both handles resolve to `keep`'s record
   * from now on and `drop`'s record is discarded.
   *
   * @returns the owning handle
   */
  join(keep: DocId, drop: DocId): DocId {
    const owner = this.resolve(keep);
    const dropped = this.resolve(drop);
    if (owner === dropped) return owner;
    this.forward.set(dropped, owner);
    this.records.delete(dropped);
    logger.trace({ keep: owner, drop: dropped }, "Joined records");
    return owner;
  }

  private nextId(): DocId {
    this.counter += 1;
    return `doc:${this.counter}`;
  }

  private insert<T extends APIDoc>(record: T): T {
    this.records.set(record.id, Object.seal(record));
    return record;
  }
}

function wrongKind(record: APIDoc, expected: string): ConstructionError {
  return new ConstructionError(
    `Record ${record.id} is a ${record.kind} record, expected ${expected}`,
    ErrorCode.WRONG_RECORD_KIND,
    { kind: record.kind }
  );
}
