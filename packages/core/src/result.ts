/**
 * Success/failure values for outcomes the caller is expected to branch on.
 *
 * @example
 * ```ts
 * const result = await analyzePasswords("cracked.txt", 5);
 * if (isOk(result)) {
 *   render(result.value);
 * } else if (result.error.code === "INSUFFICIENT_DATA") {
 *   warn(result.error.message);
 * }
 * ```
 */
import type { AuditError } from "./errors.js";

export type Ok<T> = { readonly ok: true; readonly value: T };

export type Err<E> = { readonly ok: false; readonly error: E };

export type Result<T, E = AuditError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/** Value of an Ok result; throws the error of an Err. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result;
}
