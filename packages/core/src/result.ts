/**
 * Result type for explicit error handling.
 * Services return these; only the search session itself throws.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Transform the value inside a success Result.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (result.ok) {
    return Ok(fn(result.value));
  }
  return result;
}

/**
 * Chain operations that return Results.
 * An error short-circuits the chain.
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  if (result.ok) {
    return fn(result.value);
  }
  return result;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}

/**
 * Get the value or throw the error.
 * Meant for tests and startup code.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/**
 * Message of anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a function that may throw and capture the outcome.
 * Without a mapper the error becomes its message.
 */
export function tryCatch<T>(fn: () => T): Result<T, string>;
export function tryCatch<T, E>(fn: () => T, onError: (error: unknown) => E): Result<T, E>;
export function tryCatch<T, E>(
  fn: () => T,
  onError?: (error: unknown) => E
): Result<T, E | string> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(onError ? onError(e) : errorMessage(e));
  }
}
