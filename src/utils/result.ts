/**
 * Explicit success/failure values for evaluators whose caller picks the fallback.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run an async operation and capture any rejection as a failed result.
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return ok(await operation());
  } catch (error) {
    return fail(error instanceof Error ? error : new Error(String(error)));
  }
}
