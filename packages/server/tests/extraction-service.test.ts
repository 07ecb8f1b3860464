import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { join } from 'node:path';
import { DEFAULT_ANALYSIS_OPTIONS, type ExtractionRequest } from '@schemalens/core';
import { ExtractionService } from '../src/index.js';
import { createShopDatabase, type SqliteFixture } from './helpers/sqlite-fixture.js';

let fixture: SqliteFixture;

beforeEach(() => {
  fixture = createShopDatabase();
});

afterEach(() => {
  fixture.cleanup();
});

function request(database = fixture.dbPath): ExtractionRequest {
  return { connection: { dialect: 'sqlite', database }, options: { ...DEFAULT_ANALYSIS_OPTIONS } };
}

describe('ExtractionService', () => {
  it('exposes a running snapshot as soon as a run starts', async () => {
    const service = new ExtractionService();

    const runId = service.start(request());

    expect(service.get(runId)).toMatchObject({ runId, status: 'running', state: 'pending', stepsCompleted: [] });
    expect(service.activeRuns).toBe(1);
    await service.wait(runId);
    expect(service.activeRuns).toBe(0);
  });

  it('stores the finished, frozen result', async () => {
    const service = new ExtractionService();

    const runId = service.start(request());
    const result = await service.wait(runId);

    expect(result).toMatchObject({
      runId,
      status: 'completed',
      dialect: 'sqlite',
      stepsCompleted: ['connectionTest', 'schemaExtraction', 'sensitiveDataDetection'],
    });
    expect(result?.schemaMetadata?.statistics).toEqual({ schemaCount: 1, tableCount: 2, columnCount: 6 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(service.get(runId)).toBe(result);
  });

  it('records run and stage metrics', async () => {
    const service = new ExtractionService();

    await service.runToCompletion(request());

    const lines = service.metrics.render().split('\n');
    expect(lines).toContain('schemalens_runs_started_total 1');
    expect(lines).toContain('schemalens_runs_finished_total{status="completed"} 1');
    expect(lines).toContain('schemalens_stage_runs_total{outcome="succeeded",stage="connectionTest"} 1');
    expect(lines).toContain('schemalens_stage_runs_total{outcome="succeeded",stage="schemaExtraction"} 1');
    expect(lines).toContain('schemalens_runs_active 0');
  });

  it('cancels a run before its next stage', async () => {
    const service = new ExtractionService();

    const runId = service.start(request());
    expect(service.cancel(runId)).toBe('cancelled');
    const result = await service.wait(runId);

    expect(result).toMatchObject({
      status: 'failed',
      state: 'failed',
      stepsCompleted: [],
      error: { code: 'CANCELLED', message: 'Extraction was cancelled', stage: 'connectionTest' },
    });
    expect(service.cancel(runId)).toBe('finished');
    expect(service.cancel('no-such-run')).toBe('unknown');
  });

  it('reports an unreachable database as a failed run', async () => {
    const service = new ExtractionService();

    const result = await service.runToCompletion(request(join(fixture.dir, 'absent.db')));

    expect(result).toMatchObject({
      status: 'failed',
      stepsCompleted: ['connectionTest'],
      error: { code: 'CONNECTION_FAILED', stage: 'connectionTest' },
    });
    expect(service.metrics.render().split('\n')).toContain('schemalens_runs_finished_total{status="failed"} 1');
  });

  it('probes a connection outside any run', async () => {
    const service = new ExtractionService();

    await expect(service.testConnection({ dialect: 'sqlite', database: fixture.dbPath })).resolves.toMatchObject({
      status: 'success',
      message: 'Connected to SQLite successfully',
    });
    await expect(
      service.testConnection({ dialect: 'sqlite', database: join(fixture.dir, 'absent.db') })
    ).resolves.toMatchObject({ status: 'error', code: 'CONNECTION_FAILED' });
  });

  it('keeps only the configured number of finished runs', async () => {
    const service = new ExtractionService({ extraction: { maxStoredRuns: 1 } });

    const first = service.start(request());
    await service.wait(first);
    const second = service.start(request());
    await service.wait(second);

    expect(service.get(first)).toBeUndefined();
    expect(service.get(second)?.status).toBe('completed');
  });

  it('cancels every active run on shutdown', async () => {
    const service = new ExtractionService();

    const runId = service.start(request());
    await service.shutdown();

    expect(service.get(runId)?.error?.code).toBe('CANCELLED');
    expect(service.activeRuns).toBe(0);
  });
});
