/**
 * Dotted Names
 *
 * Immutable identifier paths (`pkg.module.Class.method`) used as the name of
 * every documented value. Equality, ordering and hashing are structural over
 * the identifier sequence; use `key` when a name has to live in a Map or Set.
 *
 * @module
 */

import { ErrorCode, IdentifierSyntaxError } from "../errors.js";

/**
 * Marker identifier for values that cannot be reached by any variable path.
 */
export const UNREACHABLE = "??";

/**
 * An identifier or the unreachable marker, with optional primes (shadowed
 * values) and an optional `-N` disambiguation suffix.
 */
const IDENTIFIER_RE = /^(?:[A-Za-z_][A-Za-z0-9_]*|\?\?)'*(?:-\d+)*$/;

export type NamePiece = string | DottedName;

export class DottedName {
  private readonly identifiers: readonly string[];

  constructor(...pieces: NamePiece[]) {
    const identifiers: string[] = [];
    for (const piece of pieces) {
      if (piece instanceof DottedName) {
        identifiers.push(...piece.identifiers);
        continue;
      }
      for (const identifier of piece.split(".")) {
        if (!IDENTIFIER_RE.test(identifier)) {
          throw new IdentifierSyntaxError(
            `Bad identifier in dotted name "${piece}"`,
            ErrorCode.IDENTIFIER_SYNTAX,
            { identifier }
          );
        }
        identifiers.push(identifier);
      }
    }
    if (identifiers.length === 0) {
      throw new IdentifierSyntaxError("Empty dotted name", ErrorCode.EMPTY_NAME);
    }
    this.identifiers = identifiers;
  }

  /**
   * Parses a name without throwing; returns null for malformed input.
   */
  static tryParse(text: string): DottedName | null {
    try {
      return new DottedName(text);
    } catch (error) {
      if (error instanceof IdentifierSyntaxError) return null;
      throw error;
    }
  }

  static isIdentifier(text: string): boolean {
    return IDENTIFIER_RE.test(text);
  }

  get length(): number {
    return this.identifiers.length;
  }

  /** String form, also the structural hash key. */
  get key(): string {
    return this.identifiers.join(".");
  }

  get parts(): readonly string[] {
    return this.identifiers;
  }

  /**
   * Identifier at `index`; negative indexes count from the end.
   */
  at(index: number): string {
    const resolved = index < 0 ? this.identifiers.length + index : index;
    const identifier = this.identifiers[resolved];
    if (identifier === undefined) {
      throw new RangeError(`Index ${index} out of range for "${this.key}"`);
    }
    return identifier;
  }

  /**
   * Sub-name over `[start, end)`, or null when the slice is empty.
   */
  slice(start: number, end?: number): DottedName | null {
    const identifiers = this.identifiers.slice(start, end);
    return identifiers.length === 0 ? null : new DottedName(identifiers.join("."));
  }

  concat(...pieces: NamePiece[]): DottedName {
    return new DottedName(this, ...pieces);
  }

  /**
   * The name minus its last identifier; null for single-identifier names.
   */
  container(): DottedName | null {
    return this.slice(0, -1);
  }

  /**
   * True if this name is a prefix of `other` (every name dominates itself).
   */
  dominates(other: DottedName): boolean {
    if (other.identifiers.length < this.identifiers.length) return false;
    return this.identifiers.every((identifier, i) => other.identifiers[i] === identifier);
  }

  equals(other: DottedName | null | undefined): boolean {
    return other instanceof DottedName && other.key === this.key;
  }

  compare(other: DottedName): number {
    const shared = Math.min(this.length, other.length);
    for (let i = 0; i < shared; i++) {
      const a = this.identifiers[i] ?? "";
      const b = other.identifiers[i] ?? "";
      if (a !== b) return a < b ? -1 : 1;
    }
    return this.length - other.length;
  }

  isUnreachable(): boolean {
    return this.identifiers[0]?.startsWith(UNREACHABLE) ?? false;
  }

  toString(): string {
    return this.key;
  }

  toJSON(): string {
    return this.key;
  }
}
