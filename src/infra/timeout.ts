export function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
    operation.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Rejects as soon as `signal` aborts while leaving `operation` running.
 * The caller stays responsible for observing the outcome of `operation`.
 */
export function raceAbort<T>(
  operation: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: () => Error,
): Promise<T> {
  if (!signal) {
    return operation;
  }
  if (signal.aborted) {
    return Promise.reject(onAbort());
  }
  return new Promise<T>((resolve, reject) => {
    const abortListener = () => {
      reject(onAbort());
    };
    signal.addEventListener("abort", abortListener, { once: true });
    operation.then(
      (value) => {
        signal.removeEventListener("abort", abortListener);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", abortListener);
        reject(error);
      },
    );
  });
}
