import {
  ExtractionError,
  errorMessage,
  silentLogger,
  withRetries,
  withTimeout,
  type Logger,
  type RetryConfig,
  type StageName,
} from '@schemalens/core';
import type { StageExecutor, StagePolicy, StageTask } from '../interfaces/index.js';

/** Transient failures worth another attempt; config and cancellation are not */
const RETRYABLE_CODES = new Set(['CONNECTION_FAILED', 'QUERY_TIMEOUT', 'QUERY_FAILED', 'INTROSPECTION_FAILED']);

/** How long a timed-out attempt may take to stop and close its session */
export const DEFAULT_ABORT_GRACE_MS = 5_000;

export function isRetryableStageError(error: unknown): boolean {
  return error instanceof ExtractionError && RETRYABLE_CODES.has(error.code);
}

export interface LocalStageExecutorOptions {
  /** Used when a stage policy names no retry config (default: single attempt) */
  retry?: RetryConfig;
  /** Wait after aborting a timed-out attempt before giving up on it */
  abortGraceMs?: number;
  logger?: Logger;
}

/**
 * In-process stage runner: per-attempt deadline plus retry with backoff.
 *
 * A timed-out attempt has its signal aborted and is awaited (up to the
 * grace period) so its session is closed before the stage reports the
 * timeout or starts the next attempt.
 */
export class LocalStageExecutor implements StageExecutor {
  private readonly retry?: RetryConfig;
  private readonly abortGraceMs: number;
  private readonly logger: Logger;

  constructor(options: LocalStageExecutorOptions = {}) {
    this.retry = options.retry;
    this.abortGraceMs = options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async execute<T>(stage: StageName, task: StageTask<T>, policy: StagePolicy = {}): Promise<T> {
    return withRetries(
      (attempt) => this.runAttempt(stage, task, attempt, policy),
      policy.retry ?? this.retry,
      isRetryableStageError,
      (info) => {
        this.logger.warn('Retrying stage', {
          stage,
          attempt: info.attempt,
          attempts: info.attempts,
          delayMs: info.delayMs,
          error: errorMessage(info.error),
        });
      }
    );
  }

  private async runAttempt<T>(stage: StageName, task: StageTask<T>, attempt: number, policy: StagePolicy): Promise<T> {
    const { timeoutMs, signal } = policy;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const running = task(attempt, controller.signal);
    let timeoutError: ExtractionError | undefined;

    try {
      return await withTimeout(running, timeoutMs, () => {
        timeoutError = new ExtractionError({
          code: 'QUERY_TIMEOUT',
          message: `Stage ${stage} timed out after ${timeoutMs}ms`,
          stage,
        });
        return timeoutError;
      });
    } catch (error) {
      if (timeoutError !== undefined && error === timeoutError) {
        controller.abort();
        await this.awaitAbandoned(stage, running);
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /** The attempt's own outcome is superseded by the timeout */
  private async awaitAbandoned(stage: StageName, running: Promise<unknown>): Promise<void> {
    const settled = running.then(
      () => undefined,
      () => undefined
    );
    try {
      await withTimeout(settled, this.abortGraceMs, () => new Error(`still running after ${this.abortGraceMs}ms`));
    } catch (error) {
      this.logger.warn('Timed-out stage attempt did not stop', { stage, error: errorMessage(error) });
    }
  }
}
