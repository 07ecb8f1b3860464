export { ExtractionOrchestrator, DEFAULT_STAGE_TIMEOUTS } from './extraction-orchestrator.js';
export type { ExtractionOrchestratorOptions, RunOptions, StageTimeouts } from './extraction-orchestrator.js';
export { ExtractionRun } from './extraction-run.js';
export type { ExtractionRunOptions } from './extraction-run.js';
export {
  STAGE_OF_STATE,
  TRANSITIONS,
  assertTransition,
  canTransition,
  isTerminal,
  nextState,
  statusOf,
} from './extraction-state.js';
export { DEFAULT_ABORT_GRACE_MS, LocalStageExecutor, isRetryableStageError } from './stage-executor.js';
export type { LocalStageExecutorOptions } from './stage-executor.js';
export { buildExecutionSummary } from './execution-summary.js';
export type { SummaryInput } from './execution-summary.js';
