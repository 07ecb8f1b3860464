import { ExtractionError } from '../errors/index.js';
import type { StageName } from '../types/result.js';

/**
 * Race a promise against a deadline. The losing promise is not cancelled;
 * callers that hold a connection must still release it.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () =>
    new ExtractionError({
      code: 'QUERY_TIMEOUT',
      message: `Operation timed out after ${timeoutMs}ms`,
    })
): Promise<T> {
  if (timeoutMs === undefined) return promise;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(makeTimeoutError()), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * @throws ExtractionError CANCELLED once the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage?: StageName): void {
  if (signal?.aborted) {
    throw new ExtractionError({
      code: 'CANCELLED',
      message: 'Extraction was cancelled',
      stage,
    });
  }
}
