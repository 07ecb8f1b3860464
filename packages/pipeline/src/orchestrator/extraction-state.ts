/**
 * Extraction state machine
 *
 *   pending → testingConnection ─┬─ testOnly ──────────────────────────────→ completed
 *                                └→ introspectingSchema → classifyingSensitiveData?
 *                                                       → analyzingQuality? → completed
 *
 * `failed` is reachable from every non-terminal state. Transitions not in
 * the table are programming errors.
 */

import {
  ExtractionError,
  type AnalysisOptions,
  type ExtractionStatus,
  type PipelineState,
  type StageName,
} from '@schemalens/core';

export const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  pending: ['testingConnection', 'failed'],
  testingConnection: ['introspectingSchema', 'completed', 'failed'],
  introspectingSchema: ['classifyingSensitiveData', 'analyzingQuality', 'completed', 'failed'],
  classifyingSensitiveData: ['analyzingQuality', 'completed', 'failed'],
  analyzingQuality: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/** Stage executed while in each working state */
export const STAGE_OF_STATE: Readonly<Partial<Record<PipelineState, StageName>>> = {
  testingConnection: 'connectionTest',
  introspectingSchema: 'schemaExtraction',
  classifyingSensitiveData: 'sensitiveDataDetection',
  analyzingQuality: 'dataQualityAnalysis',
};

export function isTerminal(state: PipelineState): boolean {
  return state === 'completed' || state === 'failed';
}

export function statusOf(state: PipelineState): ExtractionStatus {
  if (state === 'completed' || state === 'failed') return state;
  return 'running';
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * @throws ExtractionError INTERNAL for a transition outside the table
 */
export function assertTransition(from: PipelineState, to: PipelineState): void {
  if (!canTransition(from, to)) {
    throw new ExtractionError({
      code: 'INTERNAL',
      message: `Illegal pipeline transition: ${from} -> ${to}`,
    });
  }
}

/**
 * Guarded successor of a working state once its stage has succeeded.
 * Failure always leads to `failed` and is not routed through here.
 */
export function nextState(state: PipelineState, options: AnalysisOptions): PipelineState {
  switch (state) {
    case 'pending':
      return 'testingConnection';
    case 'testingConnection':
      return options.testOnly ? 'completed' : 'introspectingSchema';
    case 'introspectingSchema':
      if (options.detectSensitiveData) return 'classifyingSensitiveData';
      return options.analyzeDataQuality ? 'analyzingQuality' : 'completed';
    case 'classifyingSensitiveData':
      return options.analyzeDataQuality ? 'analyzingQuality' : 'completed';
    case 'analyzingQuality':
      return 'completed';
    case 'completed':
    case 'failed':
      return state;
  }
}
