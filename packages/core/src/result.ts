/**
 * Result type for explicit error handling.
 * Failures are values: nothing partial crosses a public boundary.
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}
