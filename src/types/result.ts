/**
 * Result Type
 *
 * Expected failures (unparseable input, invalid configuration) travel as
 * values; only programming errors throw.
 */

// ============================================================================
// Core Types
// ============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Either a value or an error.
 *
 * @example
 * ```ts
 * const built = buildModel(source, { file: "Vault.rs" });
 * if (!built.ok) {
 *   logger.warn(built.error.message);
 *   return;
 * }
 * const report = await analyze(built.value);
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Extract the value or throw the error. Intended for tests and scripts where
 * a failure is a bug.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  const { error } = result;
  if (error instanceof Error) {
    throw error;
  }
  const message =
    typeof error === "object" && error !== null && "message" in error
      ? String(error.message)
      : String(error);
  throw new Error(message);
}
