/**
 * Result values for recoverable failures.
 * Parse and lowering functions return these instead of throwing.
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

export const map = <A, B, E>(r: Result<A, E>, f: (a: A) => B): Result<B, E> =>
  r.ok ? ok(f(r.value)) : r;

export const andThen = <A, B, E>(
  r: Result<A, E>,
  f: (a: A) => Result<B, E>
): Result<B, E> => (r.ok ? f(r.value) : r);

/** Value of an Ok result; throws the error of an Err result */
export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  throw r.error;
};
