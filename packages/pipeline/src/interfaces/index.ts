/**
 * Pipeline Interfaces
 */

export type { StageExecutor, StagePolicy, StageTask } from './stage-executor.js';
export type { ProgressCallback, StageEvent, StageObserver } from './progress.js';
