/**
 * Result Type for Functional Error Handling
 *
 * Expected per-class failures, such as a hierarchy with no consistent
 * linearization, are returned as values instead of thrown.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Capturing
// =============================================================================

/**
 * Runs a throwing computation, capturing errors of the given class as Err.
 * Errors of any other class propagate.
 */
export function attempt<T, E extends Error>(
  fn: () => T,
  errorClass: new (...args: never[]) => E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof errorClass) return err(error);
    throw error;
  }
}
