/**
 * ExtractionService
 *
 * Starts orchestrator runs in the background and serves their snapshots
 * for polling. Shared by the HTTP API, the MCP tools and the CLI.
 */

import { resolve } from 'node:path';
import {
  buildConnectionUrl,
  createRunId,
  errorMessage,
  silentLogger,
  type ConnectionConfig,
  type ConnectionTestResult,
  type ExtractionRequest,
  type ExtractionResult,
  type Logger,
  type SessionFactory,
} from '@schemalens/core';
import { createSession } from '@schemalens/connector-db';
import {
  ConnectionProbe,
  ExtractionOrchestrator,
  loadPatternTable,
  type ExtractionOrchestratorOptions,
} from '@schemalens/pipeline';
import type { ExtractionSection } from './config.js';
import { Metrics } from './metrics.js';
import { RunStore } from './run-store.js';

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

export interface ExtractionServiceOptions {
  extraction?: ExtractionSection;
  sessionFactory?: SessionFactory;
  logger?: Logger;
  metrics?: Metrics;
  /** Overrides the orchestrator built from `extraction` */
  orchestrator?: ExtractionOrchestrator;
}

export type CancelOutcome = 'cancelled' | 'finished' | 'unknown';

/**
 * Orchestrator options from the `extraction` config section
 */
export function orchestratorOptionsFromConfig(
  extraction: ExtractionSection,
  base: ExtractionOrchestratorOptions = {}
): ExtractionOrchestratorOptions {
  return {
    ...base,
    connectTimeoutMs: extraction?.connectTimeoutMs,
    stageTimeouts: extraction?.stageTimeouts,
    qualityConcurrency: extraction?.qualityConcurrency,
    retry: extraction?.retry,
    patternTable: extraction?.patternsFile
      ? loadPatternTable(resolve(process.cwd(), extraction.patternsFile))
      : undefined,
  };
}

export class ExtractionService {
  readonly metrics: Metrics;
  private readonly logger: Logger;
  private readonly store: RunStore;
  private readonly orchestrator: ExtractionOrchestrator;
  private readonly probe: ConnectionProbe;
  private readonly active = new Map<string, ActiveRun>();

  constructor(options: ExtractionServiceOptions = {}) {
    const sessionFactory = options.sessionFactory ?? createSession;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? new Metrics();
    this.store = new RunStore(options.extraction?.maxStoredRuns);
    this.orchestrator =
      options.orchestrator ??
      new ExtractionOrchestrator(
        orchestratorOptionsFromConfig(options.extraction, {
          sessionFactory,
          logger: this.logger,
          onStage: (event) => this.metrics.observeStage(event.stage, event.outcome, event.durationMs),
        })
      );
    this.probe = new ConnectionProbe(sessionFactory, {
      connectTimeoutMs: options.extraction?.connectTimeoutMs,
      logger: this.logger,
    });
  }

  /**
   * Start a run in the background. A `running` snapshot is readable
   * through get() as soon as this returns.
   */
  start(request: ExtractionRequest): string {
    const runId = createRunId();
    const controller = new AbortController();

    this.metrics.incRunStarted();
    const done = this.orchestrator
      .run(request, {
        runId,
        signal: controller.signal,
        onProgress: (snapshot) => this.store.put(snapshot),
      })
      .then((result) => {
        this.store.put(result);
        this.metrics.incRunFinished(result.status === 'completed' ? 'completed' : 'failed');
        this.logger.info('Extraction run finished', { runId, status: result.status });
      })
      .catch((error: unknown) => {
        this.metrics.incRunFinished('failed');
        this.logger.error('Extraction run crashed', { runId, error: errorMessage(error) });
      })
      .finally(() => {
        this.active.delete(runId);
        this.metrics.setRunsActive(this.active.size);
      });

    this.active.set(runId, { controller, done });
    this.metrics.setRunsActive(this.active.size);
    this.logger.info('Extraction run started', { runId, dialect: request.connection.dialect });
    return runId;
  }

  get(runId: string): ExtractionResult | undefined {
    return this.store.get(runId);
  }

  /** Abort a running run between stages */
  cancel(runId: string): CancelOutcome {
    const entry = this.active.get(runId);
    if (entry) {
      entry.controller.abort();
      this.logger.info('Extraction run cancellation requested', { runId });
      return 'cancelled';
    }
    return this.store.has(runId) ? 'finished' : 'unknown';
  }

  /** Latest snapshot once the run has finished */
  async wait(runId: string): Promise<ExtractionResult | undefined> {
    await this.active.get(runId)?.done;
    return this.store.get(runId);
  }

  /**
   * Start a run and wait for it
   */
  async runToCompletion(request: ExtractionRequest): Promise<ExtractionResult | undefined> {
    return this.wait(this.start(request));
  }

  /**
   * One-off connectivity check outside any run
   * @throws ExtractionError INVALID_CONFIG or UNSUPPORTED_DIALECT
   */
  async testConnection(connection: ConnectionConfig): Promise<ConnectionTestResult> {
    return this.probe.probe(buildConnectionUrl(connection));
  }

  get activeRuns(): number {
    return this.active.size;
  }

  /** Cancel every running run and wait for them to settle */
  async shutdown(): Promise<void> {
    const entries = Array.from(this.active.values());
    for (const entry of entries) {
      entry.controller.abort();
    }
    await Promise.all(entries.map((entry) => entry.done));
  }
}
