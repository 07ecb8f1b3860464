/**
 * Command-line commands
 *
 *   schemalens serve [--config <config.json>]
 *   schemalens extract --request <request.json> [--config <config.json>] [--format json|text]
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import {
  ExtractionError,
  Logger,
  errorMessage,
  parseExtractionRequest,
  type ExtractionRequest,
  type SessionFactory,
} from '@schemalens/core';
import { formatExtractionReport } from '@schemalens/pipeline';
import { ConfigError, loadConfig, parseConfig, parseJsonDocument, type ConfigFile, type EnvExpansionOptions } from './config.js';
import { ExtractionService } from './extraction-service.js';
import { runServer } from './server.js';

export const DEFAULT_SERVER_NAME = 'schemalens';
export const DEFAULT_SERVER_VERSION = '0.1.0';

export const USAGE = [
  'Usage:',
  '  schemalens serve [--config <config.json>]',
  '  schemalens extract --request <request.json> [--config <config.json>] [--format json|text]',
  '',
  'Example request.json:',
  JSON.stringify(
    {
      connection: {
        dialect: 'postgresql',
        host: 'localhost',
        port: 5432,
        database: 'shop',
        username: 'reader',
        password: '${DB_PASSWORD}',
      },
      options: { analyzeDataQuality: true, maxTablesForQualityAnalysis: 5 },
    },
    null,
    2
  ),
].join('\n');

export type OutputFormat = 'json' | 'text';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'serve'; configPath?: string }
  | { kind: 'extract'; requestPath: string; configPath?: string; format: OutputFormat };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * A bare `--config` without a command means `serve`.
 * @throws UsageError
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const [first, ...rest] = argv;
  const named = first !== undefined && !first.startsWith('-');
  const name = named ? first : 'serve';

  let values: { config?: string; request?: string; format?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: named ? rest : argv,
      options: {
        config: { type: 'string' },
        request: { type: 'string' },
        format: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }

  if (values.help || name === 'help') {
    return { kind: 'help' };
  }

  switch (name) {
    case 'serve':
      if (values.request !== undefined || values.format !== undefined) {
        throw new UsageError('--request and --format are only valid for extract');
      }
      return { kind: 'serve', configPath: values.config };

    case 'extract': {
      if (!values.request) {
        throw new UsageError('extract requires --request <request.json>');
      }
      const format = values.format ?? 'json';
      if (format !== 'json' && format !== 'text') {
        throw new UsageError(`Unknown format: ${format} (expected json or text)`);
      }
      return { kind: 'extract', requestPath: values.request, configPath: values.config, format };
    }

    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}

/**
 * Read and validate a request file. `${VAR}` placeholders expand from the
 * environment so passwords can stay out of the file.
 * @throws ConfigError | ExtractionError
 */
export async function loadRequestFile(requestPath: string, options?: EnvExpansionOptions): Promise<ExtractionRequest> {
  const absolutePath = resolve(process.cwd(), requestPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read request file ${absolutePath}: ${errorMessage(error)}`);
  }
  return parseExtractionRequest(parseJsonDocument(content, absolutePath, options));
}

export function loggerFromConfig(config: ConfigFile, fallbackLevel: 'info' | 'warn' = 'info'): Logger {
  return new Logger({
    level: config.server?.logging?.level ?? fallbackLevel,
    format: config.server?.logging?.format,
  });
}

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ExtractCommandIo {
  stdout: OutputStream;
  stderr: OutputStream;
  env?: NodeJS.ProcessEnv;
  sessionFactory?: SessionFactory;
  logger?: Logger;
}

/**
 * Run one extraction and print the result.
 * @returns exit code: 0 completed, 2 failed run, 1 bad input
 */
export async function runExtractCommand(
  command: Extract<CliCommand, { kind: 'extract' }>,
  io: ExtractCommandIo
): Promise<number> {
  const envOptions: EnvExpansionOptions = { env: io.env };

  let config: ConfigFile;
  let request: ExtractionRequest;
  try {
    config = command.configPath ? await loadConfig(command.configPath, envOptions) : parseConfig({});
    request = await loadRequestFile(command.requestPath, envOptions);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`${error.message}\n`);
      return 1;
    }
    if (error instanceof ExtractionError) {
      io.stderr.write(`${error.toActionableMessage()}\n`);
      return 1;
    }
    throw error;
  }

  const service = new ExtractionService({
    extraction: config.extraction,
    sessionFactory: io.sessionFactory,
    logger: io.logger ?? loggerFromConfig(config, 'warn'),
  });

  const result = await service.runToCompletion(request);
  if (!result) {
    io.stderr.write('Extraction result is no longer available\n');
    return 1;
  }

  io.stdout.write(
    command.format === 'text' ? `${formatExtractionReport(result)}\n` : `${JSON.stringify(result, null, 2)}\n`
  );
  return result.status === 'completed' ? 0 : 2;
}

/**
 * Start the MCP server with the given config file, or with defaults.
 */
export async function runServeCommand(command: Extract<CliCommand, { kind: 'serve' }>): Promise<void> {
  const config = command.configPath ? await loadConfig(command.configPath) : parseConfig({});
  const logger = loggerFromConfig(config);

  await runServer({
    name: config.server?.name ?? DEFAULT_SERVER_NAME,
    version: config.server?.version ?? DEFAULT_SERVER_VERSION,
    transport: config.server?.transport,
    http: config.server?.http,
    extraction: config.extraction,
    logger,
  });
}
