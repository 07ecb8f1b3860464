/**
 * ExtractionOrchestrator
 *
 * Drives one run through the state machine in extraction-state.ts. Each
 * stage opens its own session and closes it before returning, so nothing
 * but plain records crosses a stage boundary.
 */

import {
  ExtractionError,
  buildConnectionUrl,
  createRunId,
  errorMessage,
  silentLogger,
  throwIfCancelled,
  wrapError,
  type DatabaseSession,
  type ExtractionRequest,
  type ExtractionResult,
  type Logger,
  type ConnectionTestResult,
  type QualityMetric,
  type RetryConfig,
  type SchemaMetadata,
  type SensitiveDataReport,
  type SessionFactory,
  type SessionOptions,
  type StageName,
} from '@schemalens/core';
import { createSession } from '@schemalens/connector-db';
import type { ProgressCallback, StageExecutor, StageObserver, StagePolicy, StageTask } from '../interfaces/index.js';
import { ConnectionProbe, DEFAULT_CONNECT_TIMEOUT_MS } from '../probe/connection-probe.js';
import { SchemaIntrospector } from '../introspection/schema-introspector.js';
import { SensitiveColumnClassifier } from '../classification/sensitive-classifier.js';
import type { PatternTable } from '../classification/pattern-table.js';
import { DataQualityAnalyzer, DEFAULT_QUALITY_CONCURRENCY } from '../quality/quality-analyzer.js';
import { LocalStageExecutor } from './stage-executor.js';
import { ExtractionRun } from './extraction-run.js';
import { STAGE_OF_STATE, isTerminal, nextState } from './extraction-state.js';
import { buildExecutionSummary } from './execution-summary.js';

export interface StageTimeouts {
  schemaExtraction: number;
  sensitiveDataDetection: number;
  /** Per table; the quality stage as a whole has no deadline */
  tableQuality: number;
}

export const DEFAULT_STAGE_TIMEOUTS: StageTimeouts = {
  schemaExtraction: 600_000,
  sensitiveDataDetection: 300_000,
  tableQuality: 180_000,
};

/** Added to the connect timeout for the probe stage deadline */
const PROBE_GRACE_MS = 5_000;

export interface ExtractionOrchestratorOptions {
  /** Defaults to the dialect sessions of @schemalens/connector-db */
  sessionFactory?: SessionFactory;
  /** Defaults to a LocalStageExecutor with a single attempt */
  executor?: StageExecutor;
  logger?: Logger;
  connectTimeoutMs?: number;
  stageTimeouts?: Partial<StageTimeouts>;
  qualityConcurrency?: number;
  patternTable?: PatternTable;
  /** Retry config for the default executor; ignored when `executor` is given */
  retry?: RetryConfig;
  onStage?: StageObserver;
  now?: () => Date;
}

export interface RunOptions {
  runId?: string;
  /** Checked between stages and between tables */
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

/** Outputs carried from one stage to the next within a run */
interface RunContext {
  connectionUrl: string;
  metadata: SchemaMetadata | null;
  sensitive: SensitiveDataReport | null;
  quality: QualityMetric[] | null;
}

function isCancellation(error: unknown): boolean {
  return error instanceof ExtractionError && error.code === 'CANCELLED';
}

export class ExtractionOrchestrator {
  private readonly sessionFactory: SessionFactory;
  private readonly executor: StageExecutor;
  private readonly logger: Logger;
  private readonly connectTimeoutMs: number;
  private readonly stageTimeouts: StageTimeouts;
  private readonly qualityConcurrency: number;
  private readonly onStage?: StageObserver;
  private readonly now: () => Date;

  private readonly probe: ConnectionProbe;
  private readonly introspector: SchemaIntrospector;
  private readonly classifier: SensitiveColumnClassifier;
  private readonly analyzer: DataQualityAnalyzer;

  constructor(options: ExtractionOrchestratorOptions = {}) {
    this.sessionFactory = options.sessionFactory ?? createSession;
    this.logger = options.logger ?? silentLogger;
    this.executor = options.executor ?? new LocalStageExecutor({ retry: options.retry, logger: this.logger });
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.stageTimeouts = { ...DEFAULT_STAGE_TIMEOUTS, ...options.stageTimeouts };
    this.qualityConcurrency = options.qualityConcurrency ?? DEFAULT_QUALITY_CONCURRENCY;
    this.onStage = options.onStage;
    this.now = options.now ?? (() => new Date());

    this.probe = new ConnectionProbe(this.sessionFactory, {
      connectTimeoutMs: this.connectTimeoutMs,
      logger: this.logger,
    });
    this.introspector = new SchemaIntrospector(this.logger);
    this.classifier = new SensitiveColumnClassifier(options.patternTable);
    this.analyzer = new DataQualityAnalyzer({
      concurrency: this.qualityConcurrency,
      tableTimeoutMs: this.stageTimeouts.tableQuality,
      logger: this.logger,
      now: this.now,
    });
  }

  /**
   * Run the pipeline for one request. Never rejects for pipeline failures:
   * they end the run in the `failed` state with `error` set.
   */
  async run(request: ExtractionRequest, runOptions: RunOptions = {}): Promise<ExtractionResult> {
    const runId = runOptions.runId ?? createRunId();
    const { options } = request;
    const { signal } = runOptions;
    const logger = this.logger.child({ runId, dialect: request.connection.dialect });
    const run = new ExtractionRun(runId, request.connection, {
      onProgress: runOptions.onProgress,
      logger,
      now: this.now,
    });
    const started = Date.now();

    try {
      const context: RunContext = {
        connectionUrl: buildConnectionUrl(request.connection),
        metadata: null,
        sensitive: null,
        quality: null,
      };

      while (!isTerminal(run.state)) {
        await this.runCurrentState(run, context, request, logger, signal);

        const next = nextState(run.state, options);
        const nextStage = STAGE_OF_STATE[next];
        if (nextStage) {
          throwIfCancelled(signal, nextStage);
        }
        if (next === 'completed') {
          run.update({
            executionSummary: buildExecutionSummary({
              stepsCompleted: run.stepsCompleted,
              testOnly: options.testOnly,
              schemaMetadata: context.metadata,
              sensitive: context.sensitive,
              qualityMetrics: context.quality,
              durationMs: Date.now() - started,
            }),
          });
        }
        run.transition(next);
      }

      logger.info('Extraction completed', { steps: run.stepsCompleted.length, durationMs: Date.now() - started });
    } catch (error) {
      const failure = wrapError(error);
      const stage = failure.stage ?? STAGE_OF_STATE[run.state];
      logger.error('Extraction failed', { code: failure.code, stage, error: failure.message });
      run.fail({ code: failure.code, message: failure.message, ...(stage ? { stage } : {}) });
    }

    return run.snapshot();
  }

  private async runCurrentState(
    run: ExtractionRun,
    context: RunContext,
    request: ExtractionRequest,
    logger: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { options } = request;

    switch (run.state) {
      case 'pending':
      case 'completed':
      case 'failed':
        return;

      case 'testingConnection': {
        const connectionTest = await this.testConnection(run, context.connectionUrl, logger);
        run.update({ connectionTest });
        if (connectionTest.status === 'error') {
          throw new ExtractionError({
            code: connectionTest.code,
            message: connectionTest.message,
            stage: 'connectionTest',
          });
        }
        return;
      }

      case 'introspectingSchema': {
        const timeoutMs = this.stageTimeouts.schemaExtraction;
        const metadata = await this.runStage(
          run,
          logger,
          'schemaExtraction',
          (_attempt, attemptSignal) =>
            this.withSession(context.connectionUrl, logger, { queryTimeoutMs: timeoutMs }, (session) =>
              this.introspector.introspect(session, request.connection.database, {
                schemas: options.schemas,
                signal: attemptSignal,
              })
            ),
          { timeoutMs, signal }
        );
        context.metadata = metadata;
        run.update({ schemaMetadata: metadata });
        return;
      }

      case 'classifyingSensitiveData': {
        const metadata = this.requireMetadata(context);
        try {
          const report = await this.runStage(
            run,
            logger,
            'sensitiveDataDetection',
            async () => this.classifier.classify(metadata),
            { timeoutMs: this.stageTimeouts.sensitiveDataDetection, signal }
          );
          context.sensitive = report;
          run.update({ sensitiveFindings: report.findings });
        } catch (error) {
          // Classification never gates the run
          if (isCancellation(error)) throw error;
          logger.error('Sensitive data detection failed', { error: errorMessage(error) });
        }
        return;
      }

      case 'analyzingQuality': {
        const metadata = this.requireMetadata(context);
        const maxTables = options.maxTablesForQualityAnalysis;
        const metrics = await this.runStage(
          run,
          logger,
          'dataQualityAnalysis',
          async (_attempt, attemptSignal) => {
            try {
              return await this.withSession(
                context.connectionUrl,
                logger,
                { maxConnections: this.qualityConcurrency, queryTimeoutMs: this.stageTimeouts.tableQuality },
                (session) => this.analyzer.analyze(session, metadata, maxTables, attemptSignal)
              );
            } catch (error) {
              if (isCancellation(error)) throw error;
              logger.warn('Quality analysis could not start', { error: errorMessage(error) });
              return this.analyzer.failAll(metadata, maxTables, error);
            }
          },
          { signal }
        );
        context.quality = metrics;
        run.update({ qualityMetrics: metrics });
        return;
      }
    }
  }

  /** The probe reports failures as values; only those it cannot classify throw */
  private async testConnection(
    run: ExtractionRun,
    connectionUrl: string,
    logger: Logger
  ): Promise<ConnectionTestResult> {
    try {
      return await this.runStage(
        run,
        logger,
        'connectionTest',
        async () => {
          const result = await this.probe.probe(connectionUrl);
          if (result.status === 'error') {
            throw new ExtractionError({ code: result.code, message: result.message, stage: 'connectionTest' });
          }
          return result;
        },
        { timeoutMs: this.connectTimeoutMs + PROBE_GRACE_MS }
      );
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      return {
        status: 'error',
        message: error.message,
        timestamp: this.now().toISOString(),
        code: error.code,
      };
    }
  }

  private async runStage<T>(
    run: ExtractionRun,
    logger: Logger,
    stage: StageName,
    task: StageTask<T>,
    policy: StagePolicy = {}
  ): Promise<T> {
    const started = Date.now();
    logger.info('Stage started', { stage });

    let outcome: 'succeeded' | 'failed' = 'failed';
    try {
      const value = await this.executor.execute(stage, task, policy);
      outcome = 'succeeded';
      return value;
    } finally {
      const durationMs = Date.now() - started;
      run.recordStep(stage);
      logger.info('Stage finished', { stage, outcome, durationMs });
      this.onStage?.({ runId: run.runId, stage, outcome, durationMs });
    }
  }

  private async withSession<T>(
    connectionUrl: string,
    logger: Logger,
    options: SessionOptions,
    fn: (session: DatabaseSession) => Promise<T>
  ): Promise<T> {
    const session = this.sessionFactory(connectionUrl, { connectTimeoutMs: this.connectTimeoutMs, ...options });
    try {
      await session.connect();
      return await fn(session);
    } finally {
      try {
        await session.close();
      } catch (error) {
        logger.warn('Failed to close session', { error: errorMessage(error) });
      }
    }
  }

  private requireMetadata(context: RunContext): SchemaMetadata {
    if (!context.metadata) {
      throw new ExtractionError({ code: 'INTERNAL', message: 'Schema metadata is missing for a dependent stage' });
    }
    return context.metadata;
  }
}
