export type Success<T> = {
  data: T;
  error: null;
};

export type Failure<E> = {
  data: null;
  error: E;
};

/**
 * Either success or failure; check `error` before touching `data`
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

/**
 * Normalize anything thrown into an Error
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new Error(String(thrown));
}

/**
 * Await a promise, returning a Result instead of throwing
 *
 * @example
 * const { data, error } = await tryCatch(store.loadAll());
 * if (error) {
 *   log.error("Reload failed:", error);
 *   return;
 * }
 */
export async function tryCatch<T>(promise: Promise<T>): Promise<Result<T>> {
  try {
    return { data: await promise, error: null };
  } catch (thrown) {
    return { data: null, error: toError(thrown) };
  }
}
