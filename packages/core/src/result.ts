/**
 * Generic Result pattern for explicit error handling.
 * Error types belong to the caller: a check or action picks its own `E`.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Thrown by `unwrap` when the result holds an error. The original error is
 * kept as `cause`.
 */
export class UnwrapError extends Error {
  constructor(cause: unknown) {
    super(`unwrap called on an error result: ${describe(cause)}`, { cause });
    this.name = "UnwrapError";
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "kind" in error) {
    return String(error.kind);
  }
  return String(error);
}

/** Return the value, or abort by throwing an UnwrapError. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw new UnwrapError(result.error);
}
