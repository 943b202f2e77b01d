/** Outcome of a conversion step, hook, or construction call. Failures are values, never thrown. */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/** Wrap a successful value. */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Wrap a failure. */
export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
