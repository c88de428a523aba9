/***
 * Result — Explicit success/failure outcome for fallible conversions.
 *
 * Narrow with `if (r.ok)` to reach either `value` or `error`.
 *
 ***/

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Return the success value, or throw the carried error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export function unwrap_or<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
