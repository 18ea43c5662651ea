/**
 * @fileoverview Result type for explicit error handling
 *
 * Used where failure is an expected outcome that the caller turns into
 * data (decoding engine stdout, parsing CSV fields) rather than a throw.
 */

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
  return !result.ok;
}

/**
 * Parse JSON text, keeping the parser's own error message.
 */
export function safeJsonParse<T = unknown>(text: string): Result<T, Error> {
  try {
    return Ok(JSON.parse(text) as T);
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
