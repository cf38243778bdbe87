/**
 * Names for values that no variable path reaches.
 *
 * One registry per build. Each minted name is remembered so that a later
 * request for the same base gets `-2`, `-3`, ... appended to its last
 * identifier.
 */

import { DottedName, UNREACHABLE } from "./dotted-name.js";

export class UnreachableNames {
  private readonly issued = new Set<string>();

  /**
   * Mints `??` or `??.<hint>` (hint dropped if it is not a valid name).
   */
  mint(hint?: DottedName | string | null): DottedName {
    return this.reserve(this.baseName(hint));
  }

  /**
   * Reserves `base`, or the first free `base-N` when it is taken.
   */
  reserve(base: DottedName): DottedName {
    let name = base;
    if (this.issued.has(name.key)) {
      let n = 2;
      while (this.issued.has(`${base.key}-${n}`)) n++;
      name = new DottedName(`${base.key}-${n}`);
    }
    this.issued.add(name.key);
    return name;
  }

  has(name: DottedName): boolean {
    return this.issued.has(name.key);
  }

  get size(): number {
    return this.issued.size;
  }

  private baseName(hint?: DottedName | string | null): DottedName {
    if (hint instanceof DottedName) return new DottedName(UNREACHABLE, hint);
    if (typeof hint === "string") {
      const parsed = DottedName.tryParse(hint);
      if (parsed) return new DottedName(UNREACHABLE, parsed);
    }
    return new DottedName(UNREACHABLE);
  }
}
