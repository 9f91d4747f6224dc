/**
 * Result Type
 *
 * Explicit success/failure values for operations whose failure is an
 * expected outcome rather than an exception.
 */

/** Successful result */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed result */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/** Result type - either Ok or Err */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/** Create a successful result */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/** Create a failed result */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Check if result is Ok */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

/** Check if result is Err */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/** Map over a successful result */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/** Unwrap or throw - use sparingly at boundaries */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Wrap a promise in a Result */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (error) {
    return err(errorMapper(error));
  }
}
