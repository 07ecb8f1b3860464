/**
 * In-memory store of run snapshots, keyed by run id
 *
 * Snapshots are deep-frozen on the way in so pollers can share them.
 * Running runs are never evicted; once more than `maxFinishedRuns` runs
 * have finished, the ones that finished first are dropped.
 */

import type { ExtractionResult } from '@schemalens/core';

export const DEFAULT_MAX_STORED_RUNS = 100;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class RunStore {
  private readonly runs = new Map<string, ExtractionResult>();
  private readonly finishedOrder: string[] = [];

  constructor(private readonly maxFinishedRuns = DEFAULT_MAX_STORED_RUNS) {
    if (!Number.isInteger(maxFinishedRuns) || maxFinishedRuns < 1) {
      throw new Error(`RunStore maxFinishedRuns must be >= 1 (got ${maxFinishedRuns})`);
    }
  }

  get size(): number {
    return this.runs.size;
  }

  /**
   * Record the latest snapshot of a run. The caller must not mutate
   * `snapshot` afterwards.
   */
  put(snapshot: ExtractionResult): void {
    const previous = this.runs.get(snapshot.runId);
    this.runs.set(snapshot.runId, deepFreeze(snapshot));

    const finished = snapshot.status !== 'running';
    const wasFinished = previous !== undefined && previous.status !== 'running';
    if (finished && !wasFinished) {
      this.finishedOrder.push(snapshot.runId);
      this.evict();
    }
  }

  get(runId: string): ExtractionResult | undefined {
    return this.runs.get(runId);
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  list(): ExtractionResult[] {
    return Array.from(this.runs.values());
  }

  private evict(): void {
    while (this.finishedOrder.length > this.maxFinishedRuns) {
      const oldest = this.finishedOrder.shift();
      if (oldest !== undefined) this.runs.delete(oldest);
    }
  }
}
