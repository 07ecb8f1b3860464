import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { DEFAULT_ANALYSIS_OPTIONS, type AnalysisOptions, type ExtractionRequest } from '@schemalens/core';
import { ExtractionOrchestrator } from '../src/index.js';

let tmpDir = '';
let dbPath = '';

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'pipeline-'));
  dbPath = join(tmpDir, 'shop.db');

  const db = new Database(dbPath);
  db.exec(`
    CREATE TABLE users (
      id INTEGER PRIMARY KEY,
      email TEXT NOT NULL,
      password_hash TEXT NOT NULL,
      first_name TEXT
    );
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      user_id INTEGER REFERENCES users(id),
      order_number TEXT
    );
    CREATE TABLE products (
      id INTEGER PRIMARY KEY,
      sku TEXT UNIQUE
    );
    INSERT INTO users VALUES
      (1, 'a@example.com', 'x1', 'Ada'),
      (2, 'b@example.com', 'x2', NULL),
      (3, 'c@example.com', 'x3', 'Ada'),
      (4, 'd@example.com', 'x4', NULL);
  `);
  db.close();
});

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function request(options: Partial<AnalysisOptions> = {}): ExtractionRequest {
  return {
    connection: { dialect: 'sqlite', database: dbPath },
    options: { ...DEFAULT_ANALYSIS_OPTIONS, ...options },
  };
}

describe('extraction against a SQLite file', () => {
  it('only tests the connection in testOnly mode', async () => {
    const result = await new ExtractionOrchestrator().run(request({ testOnly: true }));

    expect(result.status).toBe('completed');
    expect(result.stepsCompleted).toEqual(['connectionTest']);
    expect(result.connectionTest).toMatchObject({ status: 'success', message: 'Connected to SQLite successfully' });
    expect(result.schemaMetadata).toBeNull();
  });

  it('extracts schema, sensitive columns and quality metrics', async () => {
    const result = await new ExtractionOrchestrator().run(request({ analyzeDataQuality: true }));

    expect(result.status).toBe('completed');
    expect(result.schemaMetadata?.statistics).toEqual({ schemaCount: 1, tableCount: 3, columnCount: 9 });
    expect(result.schemaMetadata?.schemas[0]?.tables[1]?.foreignKeys).toEqual([
      { name: null, column: 'user_id', refSchema: 'main', refTable: 'users', refColumn: 'id' },
    ]);
    expect(result.sensitiveFindings?.map((f) => [f.column, f.category, f.confidence])).toEqual([
      ['email', 'PII', 'High'],
      ['password_hash', 'Authentication', 'Medium'],
      ['first_name', 'PII', 'Medium'],
    ]);

    const users = result.qualityMetrics?.[0];
    if (users?.status !== 'analyzed') throw new Error('users was not analyzed');
    expect(users.rowCount).toBe(4);
    expect(users.columns.find((c) => c.column === 'first_name')).toEqual({
      column: 'first_name',
      dataType: 'TEXT',
      nullCount: 2,
      nullPercentage: 50,
      distinctCount: 1,
      uniquenessRatio: 0.25,
    });
    expect(result.qualityMetrics?.[1]).toMatchObject({ status: 'analyzed', table: 'orders', rowCount: 0 });
  });

  it('fails at the connection test for a missing file', async () => {
    const result = await new ExtractionOrchestrator().run({
      ...request(),
      connection: { dialect: 'sqlite', database: join(tmpDir, 'absent.db') },
    });

    expect(result.status).toBe('failed');
    expect(result.stepsCompleted).toEqual(['connectionTest']);
    expect(result.error).toMatchObject({ code: 'CONNECTION_FAILED', stage: 'connectionTest' });
  });
});
