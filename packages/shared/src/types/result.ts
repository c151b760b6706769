// ─── Result ────────────────────────────────────────────────────────
// Outcome of a background command. Callers branch on `ok` instead of
// catching exceptions.

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
