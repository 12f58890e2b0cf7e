/**
 * Result Pattern
 *
 * Makes expected failures explicit instead of throwing. Used for oracle
 * responses, where a transport failure is a normal, recoverable outcome.
 */

/**
 * Success result containing data
 */
export interface Ok<T> {
  readonly success: true;
  readonly data: T;
}

/**
 * Failure result containing error
 */
export interface Err<E> {
  readonly success: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(data: T): Ok<T> {
  return { success: true, data };
}

export function err<E>(error: E): Err<E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.success === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.success === false;
}
