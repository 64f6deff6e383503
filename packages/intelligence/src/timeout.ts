/** Longest delay `setTimeout` honours; larger values fire almost at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Settle with the task's outcome, or reject with `onTimeout()` once `ms`
 * elapses. The task is not cancelled; its late result is dropped.
 *
 * Rejects with a `RangeError` when `ms` is not in 1..MAX_TIMEOUT_MS.
 */
export function withTimeout<T>(task: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0 || ms > MAX_TIMEOUT_MS) {
    return Promise.reject(new RangeError(`Timeout must be between 1 and ${MAX_TIMEOUT_MS}ms, got ${ms}`));
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      reject(onTimeout());
    }, ms);

    task.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
