export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Races a promise against a timer and folds both outcomes into a Result.
 * Used around every collaborator call so a slow backend degrades instead of hanging the turn.
 */
export async function settle<T, E>(
  operation: Promise<T>,
  timeoutMs: number,
  toError: (cause: unknown) => E,
): Promise<Result<T, E>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return ok(await Promise.race([operation, timeout]));
  } catch (error) {
    return err(toError(error));
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
