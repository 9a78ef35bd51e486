// src/utils/timeout.ts

/**
 * Creates a timeout promise that rejects after the given time. The returned
 * `cancel` must be called once the raced work settles.
 */
export function createTimeout(ms: number, message: string): { promise: Promise<never>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Timeout: ${message} (${ms}ms)`));
    }, ms);
  });

  return {
    promise,
    cancel: () => clearTimeout(timer),
  };
}

/**
 * Wraps a promise with a timeout
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string
): Promise<T> {
  const timeout = createTimeout(timeoutMs, errorMessage);
  try {
    return await Promise.race([promise, timeout.promise]);
  } finally {
    timeout.cancel();
  }
}
