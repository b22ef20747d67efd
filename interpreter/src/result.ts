/**
 * Result type threaded through the reader, environment and evaluator.
 */

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const map = <T, U, E>(r: Result<T, E>, fn: (t: T) => U): Result<U, E> =>
  r.ok ? ok(fn(r.value)) : r;

export const andThen = <T, U, E>(
  r: Result<T, E>,
  fn: (t: T) => Result<U, E>,
): Result<U, E> => (r.ok ? fn(r.value) : r);

/**
 * Apply `fn` to each item in order, stopping at the first error.
 */
export function mapAll<T, U, E>(items: readonly T[], fn: (item: T) => Result<U, E>): Result<U[], E> {
  const out: U[] = [];
  for (const item of items) {
    const r = fn(item);
    if (!r.ok) return r;
    out.push(r.value);
  }
  return ok(out);
}
