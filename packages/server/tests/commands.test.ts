import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { silentLogger } from '@schemalens/core';
import { UsageError, loadRequestFile, parseCliArgs, runExtractCommand, type OutputStream } from '../src/index.js';
import { createShopDatabase, type SqliteFixture } from './helpers/sqlite-fixture.js';

class Capture implements OutputStream {
  text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe('parseCliArgs', () => {
  it('treats a bare --config as serve', () => {
    expect(parseCliArgs(['--config', 'config.json'])).toEqual({ kind: 'serve', configPath: 'config.json' });
    expect(parseCliArgs([])).toEqual({ kind: 'serve', configPath: undefined });
  });

  it('parses extract with a default json format', () => {
    expect(parseCliArgs(['extract', '--request', 'req.json'])).toEqual({
      kind: 'extract',
      requestPath: 'req.json',
      configPath: undefined,
      format: 'json',
    });
    expect(parseCliArgs(['extract', '--request', 'req.json', '--format', 'text', '--config', 'c.json'])).toEqual({
      kind: 'extract',
      requestPath: 'req.json',
      configPath: 'c.json',
      format: 'text',
    });
  });

  it('returns help for -h and the help command', () => {
    expect(parseCliArgs(['extract', '-h'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['help'])).toEqual({ kind: 'help' });
  });

  it('rejects bad usage', () => {
    expect(() => parseCliArgs(['extract'])).toThrow(new UsageError('extract requires --request <request.json>'));
    expect(() => parseCliArgs(['extract', '--request', 'r.json', '--format', 'xml'])).toThrow(
      new UsageError('Unknown format: xml (expected json or text)')
    );
    expect(() => parseCliArgs(['serve', '--format', 'text'])).toThrow(
      new UsageError('--request and --format are only valid for extract')
    );
    expect(() => parseCliArgs(['frobnicate'])).toThrow(new UsageError('Unknown command: frobnicate'));
    expect(() => parseCliArgs(['--bogus'])).toThrow(UsageError);
  });
});

describe('extract command', () => {
  let fixture: SqliteFixture;

  beforeEach(() => {
    fixture = createShopDatabase();
  });

  afterEach(() => {
    fixture.cleanup();
  });

  function writeRequest(body: unknown): string {
    const path = join(fixture.dir, 'request.json');
    writeFileSync(path, JSON.stringify(body));
    return path;
  }

  async function run(requestPath: string, format: 'json' | 'text' = 'json', env: NodeJS.ProcessEnv = {}) {
    const stdout = new Capture();
    const stderr = new Capture();
    const code = await runExtractCommand(
      { kind: 'extract', requestPath, format },
      { stdout, stderr, env, logger: silentLogger }
    );
    return { code, stdout: stdout.text, stderr: stderr.text };
  }

  it('prints the JSON result and exits 0 on success', async () => {
    const path = writeRequest({ connection: { dialect: 'sqlite', database: fixture.dbPath } });

    const { code, stdout, stderr } = await run(path);

    expect(code).toBe(0);
    expect(stderr).toBe('');
    expect(JSON.parse(stdout)).toMatchObject({
      status: 'completed',
      stepsCompleted: ['connectionTest', 'schemaExtraction', 'sensitiveDataDetection'],
    });
  });

  it('prints the text report when asked', async () => {
    const path = writeRequest({ connection: { dialect: 'sqlite', database: fixture.dbPath }, options: { testOnly: true } });

    const { code, stdout } = await run(path, 'text');

    expect(code).toBe(0);
    expect(stdout.startsWith('## Extraction Report\n')).toBe(true);
    expect(stdout).toContain('Status: completed\n');
  });

  it('exits 2 when the run fails', async () => {
    const path = writeRequest({ connection: { dialect: 'sqlite', database: join(fixture.dir, 'absent.db') } });

    const { code, stdout } = await run(path);

    expect(code).toBe(2);
    expect(JSON.parse(stdout)).toMatchObject({ status: 'failed', error: { code: 'CONNECTION_FAILED' } });
  });

  it('exits 1 with a message for invalid requests', async () => {
    const unsupported = await run(writeRequest({ connection: { dialect: 'oracle' } }));
    expect(unsupported.code).toBe(1);
    expect(unsupported.stdout).toBe('');
    expect(unsupported.stderr.startsWith('Error [UNSUPPORTED_DIALECT]: Unsupported database dialect: "oracle"\n')).toBe(
      true
    );

    const missingEnv = await run(
      writeRequest({ connection: { dialect: 'sqlite', database: '${SHOP_DB}' } })
    );
    expect(missingEnv).toEqual({ code: 1, stdout: '', stderr: 'Missing required environment variable: SHOP_DB\n' });
  });

  it('expands environment placeholders in request files', async () => {
    const path = writeRequest({ connection: { dialect: 'sqlite', database: '${SHOP_DB}' } });

    await expect(loadRequestFile(path, { env: { SHOP_DB: fixture.dbPath } })).resolves.toEqual({
      connection: { dialect: 'sqlite', database: fixture.dbPath },
      options: {
        testOnly: false,
        analyzeDataQuality: false,
        detectSensitiveData: true,
        maxTablesForQualityAnalysis: 5,
      },
    });
  });
});
