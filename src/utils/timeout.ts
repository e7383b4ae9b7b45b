import { TimeoutError } from '../errors';

/**
 * Race an operation against a timer. On expiry the optional controller is
 * aborted so the operation can stop its own work.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  name: string,
  controller?: AbortController
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(name, timeoutMs);
      controller?.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/** Exponential backoff with a cap: base * 2^attempt */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * Math.pow(2, attempt), maxMs);
}
