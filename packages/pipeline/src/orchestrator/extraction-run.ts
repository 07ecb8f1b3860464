/**
 * Mutable record of one run, owned by the orchestrator. Everything that
 * leaves it is a structured clone.
 */

import {
  ExtractionError,
  errorMessage,
  silentLogger,
  type ConnectionConfig,
  type ExtractionFailure,
  type ExtractionResult,
  type Logger,
  type PipelineState,
  type StageName,
} from '@schemalens/core';
import type { ProgressCallback } from '../interfaces/index.js';
import { assertTransition, isTerminal, statusOf } from './extraction-state.js';

type StageOutputs = Partial<
  Pick<ExtractionResult, 'connectionTest' | 'schemaMetadata' | 'sensitiveFindings' | 'qualityMetrics' | 'executionSummary'>
>;

export interface ExtractionRunOptions {
  onProgress?: ProgressCallback;
  logger?: Logger;
  now?: () => Date;
}

export class ExtractionRun {
  private readonly result: ExtractionResult;
  private readonly onProgress?: ProgressCallback;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(runId: string, connection: ConnectionConfig, options: ExtractionRunOptions = {}) {
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.result = {
      runId,
      status: 'running',
      state: 'pending',
      dialect: connection.dialect,
      database: connection.database,
      stepsCompleted: [],
      connectionTest: null,
      schemaMetadata: null,
      sensitiveFindings: null,
      qualityMetrics: null,
      executionSummary: null,
      startedAt: this.now().toISOString(),
    };
    this.emit();
  }

  get runId(): string {
    return this.result.runId;
  }

  get state(): PipelineState {
    return this.result.state;
  }

  get stepsCompleted(): readonly StageName[] {
    return this.result.stepsCompleted;
  }

  transition(to: PipelineState): void {
    assertTransition(this.result.state, to);
    this.result.state = to;
    this.result.status = statusOf(to);
    if (isTerminal(to)) {
      this.result.finishedAt = this.now().toISOString();
    }
    this.emit();
  }

  /** Append-only: a stage is recorded once it has been attempted */
  recordStep(stage: StageName): void {
    this.result.stepsCompleted.push(stage);
    this.emit();
  }

  /**
   * Attach stage outputs. Findings and quality metrics describe tables of
   * the schema snapshot, so they cannot be attached without one.
   * @throws ExtractionError INTERNAL
   */
  update(outputs: StageOutputs): void {
    if (isTerminal(this.result.state)) {
      throw new ExtractionError({ code: 'INTERNAL', message: `Run ${this.result.runId} is already ${this.result.state}` });
    }
    const schema = outputs.schemaMetadata ?? this.result.schemaMetadata;
    if (!schema && (outputs.sensitiveFindings || outputs.qualityMetrics)) {
      throw new ExtractionError({
        code: 'INTERNAL',
        message: 'Stage results cannot be recorded before schema metadata',
      });
    }
    Object.assign(this.result, outputs);
    this.emit();
  }

  fail(failure: ExtractionFailure): void {
    this.result.error = failure;
    this.result.executionSummary = null;
    this.transition('failed');
  }

  snapshot(): ExtractionResult {
    return structuredClone(this.result);
  }

  private emit(): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(this.snapshot());
    } catch (error) {
      this.logger.warn('Progress callback threw', { error: errorMessage(error) });
    }
  }
}
