import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { formatZodIssues } from '@schemalens/core';
import { z } from 'zod';

export type TransportMode = 'stdio' | 'http';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed
 * JSON document. The result is validated afterwards, so it stays `unknown`.
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const timeoutMs = z.number().int().min(1).max(3_600_000);

export const serverSchema = z
  .object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    transport: z.enum(['stdio', 'http']).optional(),
    http: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(1).max(65535).optional(),
        path: z.string().min(1).optional(),
        metricsPath: z.string().min(1).optional(),
        healthPath: z.string().min(1).optional(),
        maxRequestBytes: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .optional();

export type ServerSection = z.infer<typeof serverSchema>;

export const extractionSchema = z
  .object({
    connectTimeoutMs: timeoutMs.optional(),
    stageTimeouts: z
      .object({
        schemaExtraction: timeoutMs.optional(),
        sensitiveDataDetection: timeoutMs.optional(),
        tableQuality: timeoutMs.optional(),
      })
      .strict()
      .optional(),
    qualityConcurrency: z.number().int().min(1).max(64).optional(),
    retry: z
      .object({
        attempts: z.number().int().min(1).max(10).optional(),
        baseDelayMs: z.number().int().min(0).optional(),
        maxDelayMs: z.number().int().min(0).optional(),
        jitter: z.number().min(0).max(1).optional(),
      })
      .strict()
      .optional(),
    maxStoredRuns: z.number().int().min(1).optional(),
    /** Replacement sensitive-column pattern table (JSON) */
    patternsFile: z.string().min(1).optional(),
  })
  .strict()
  .optional();

export type ExtractionSection = z.infer<typeof extractionSchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    server: serverSchema,
    extraction: extractionSchema,
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Parse JSON text, tolerating a UTF-8 BOM (common on Windows), and expand
 * env placeholders
 * @throws ConfigError
 */
export function parseJsonDocument(content: string, source: string, options?: EnvExpansionOptions): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return expandEnvVars(parsed, options);
}

/**
 * @throws ConfigError
 */
export function parseConfig(input: unknown): ConfigFile {
  const result = configFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatZodIssues('Invalid config file', result.error));
  }
  return result.data;
}

/**
 * Read, expand and validate a config file. Relative paths resolve against
 * the working directory.
 * @throws ConfigError
 */
export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(parseJsonDocument(content, absolutePath, options));
}
