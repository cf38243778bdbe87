/**
 * The Unknown sentinel
 *
 * Every declared record attribute starts out as UNKNOWN: a third state,
 * distinct from `null` (known to be absent). Fields are typed `Maybe<T>`, so
 * using an unknown value as a `T` does not compile; at run time the sentinel
 * refuses coercion to a primitive.
 *
 * @module
 */

import { SentinelMisuseError } from "../errors.js";

export class Unknown {
  private static instance: Unknown | undefined;

  private constructor() {}

  static get(): Unknown {
    if (!Unknown.instance) Unknown.instance = new Unknown();
    return Unknown.instance;
  }

  [Symbol.toPrimitive](): never {
    throw new SentinelMisuseError("UNKNOWN cannot be used as a primitive value");
  }

  toJSON(): string {
    return "<UNKNOWN>";
  }

  get [Symbol.toStringTag](): string {
    return "Unknown";
  }
}

export const UNKNOWN: Unknown = Unknown.get();

export type Maybe<T> = T | Unknown;

export function isUnknown(value: unknown): value is Unknown {
  return value === UNKNOWN;
}

export function isKnown<T>(value: Maybe<T>): value is T {
  return value !== UNKNOWN;
}

/**
 * Known and not null.
 */
export function isPresent<T>(value: Maybe<T | null>): value is T {
  return value !== UNKNOWN && value !== null;
}

/**
 * Returns the value, or throws if it is UNKNOWN.
 *
 * @param what - description used in the error message
 */
export function known<T>(value: Maybe<T>, what: string): T {
  if (value instanceof Unknown) {
    throw new SentinelMisuseError(`${what} is UNKNOWN`, { what });
  }
  return value;
}

/**
 * Strict boolean view of a ternary flag; UNKNOWN throws.
 */
export function isTrue(value: Maybe<boolean>, what = "flag"): boolean {
  return known(value, what);
}

/**
 * Maps `undefined` (not supplied) to UNKNOWN.
 */
export function orUnknown<T>(value: T | undefined): Maybe<T> {
  return value === undefined ? UNKNOWN : value;
}
