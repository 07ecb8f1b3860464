export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Exponential backoff base delay (default: 200ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 5000ms). */
  maxDelayMs?: number;
  /** Random jitter factor between 0 and 1 (default: 0.2). */
  jitter?: number;
};

export type RetryAttempt = {
  attempt: number;
  attempts: number;
  delayMs: number;
  error: unknown;
};

type ResolvedRetryConfig = Required<RetryConfig>;

function resolveConfig(cfg: RetryConfig | undefined): ResolvedRetryConfig {
  return {
    attempts: Math.max(1, Math.floor(cfg?.attempts ?? 1)),
    baseDelayMs: Math.max(0, cfg?.baseDelayMs ?? 200),
    maxDelayMs: Math.max(0, cfg?.maxDelayMs ?? 5000),
    jitter: Math.max(0, Math.min(1, cfg?.jitter ?? 0.2)),
  };
}

/** Delay before attempt `n` (2-based; the first attempt never waits) */
export function backoffDelayMs(cfg: RetryConfig | undefined, attempt: number): number {
  if (attempt <= 1) return 0;
  const config = resolveConfig(cfg);
  const raw = config.baseDelayMs * 2 ** (attempt - 2);
  const capped = Math.min(config.maxDelayMs, raw);
  const jitterFactor = 1 + (Math.random() * 2 - 1) * config.jitter;
  return Math.max(0, Math.round(capped * jitterFactor));
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, the attempts are used up, or it throws
 * something `isRetryable` rejects. The last error is rethrown as is.
 */
export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  onRetry?: (info: RetryAttempt) => void
): Promise<T> {
  const { attempts } = resolveConfig(cfg);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) {
        throw err;
      }
      const delayMs = backoffDelayMs(cfg, attempt + 1);
      onRetry?.({ attempt, attempts, delayMs, error: err });
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
