/**
 * Result type for fallible operations.
 * Pipeline steps return these; only the pipeline boundary turns an Err into a fallback.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Await `fn`, mapping a rejection to Err via `onError`. */
export async function tryAsync<T, E>(
  fn: () => Promise<T>,
  onError: (err: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (err) {
    return Err(onError(err))
  }
}
