import type { ExtractionResult, StageName } from '@schemalens/core';

/** Receives a detached snapshot after every state change of a run */
export interface ProgressCallback {
  (snapshot: ExtractionResult): void;
}

export interface StageEvent {
  runId: string;
  stage: StageName;
  outcome: 'succeeded' | 'failed';
  durationMs: number;
}

/** Stage timing hook, used for metrics */
export interface StageObserver {
  (event: StageEvent): void;
}
