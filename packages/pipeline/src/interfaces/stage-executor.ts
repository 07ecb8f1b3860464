/**
 * Stage executor interface
 *
 * The seam between the orchestrator and whatever runs its stages. A
 * durable workflow engine can implement this to persist progress and
 * apply its own timeout and retry policy; LocalStageExecutor runs stages
 * in process.
 */

import type { RetryConfig, StageName } from '@schemalens/core';

export interface StagePolicy {
  /** Deadline for one attempt of the stage */
  timeoutMs?: number;
  /** Retry-with-backoff around the whole stage call */
  retry?: RetryConfig;
  /** Run-level cancellation, forwarded to every attempt's signal */
  signal?: AbortSignal;
}

/**
 * One attempt of a stage. `signal` fires when the attempt's deadline passes
 * or the run is cancelled; the task must stop issuing queries and release
 * its session.
 */
export type StageTask<T> = (attempt: number, signal: AbortSignal) => Promise<T>;

export interface StageExecutor {
  /**
   * Run one stage invocation. `task` receives the 1-based attempt number.
   * @throws ExtractionError QUERY_TIMEOUT when an attempt exceeds `policy.timeoutMs`
   */
  execute<T>(stage: StageName, task: StageTask<T>, policy?: StagePolicy): Promise<T>;
}
