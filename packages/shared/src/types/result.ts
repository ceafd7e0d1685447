// ============================================
// Result Type
// ============================================

/**
 * Discriminated union for operations that can fail without throwing.
 *
 * @example
 * ```typescript
 * const result = loadConfig();
 * if (result.ok) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Creates a successful result.
 */
export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed result.
 */
export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
