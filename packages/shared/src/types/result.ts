/**
 * Result Type
 *
 * Discriminated union for operations that can fail without throwing.
 * Callers branch on `ok` instead of catching.
 *
 * @module @wordclass/shared/result
 */

/** Successful outcome */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed outcome */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
