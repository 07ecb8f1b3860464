/**
 * Zod schemas for extraction requests
 *
 * Shape checks live here; dialect and required-field rules live in
 * validateConnectionConfig so every entry point reports the same codes.
 */

import { z } from 'zod';
import type { AnalysisOptions, ConnectionConfig, ExtractionRequest } from '../types/connection.js';
import { ExtractionError } from '../errors/index.js';
import { validateConnectionConfig } from '../utils/connection-url.js';

/** Ports arrive as numbers from JSON clients and as strings from HTML forms */
const portSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^\d+$/, 'Port must be numeric')
    .transform((value) => Number.parseInt(value, 10)),
]);

export const connectionInputSchema = z
  .object({
    dialect: z.string().min(1),
    host: z.string().optional(),
    port: portSchema.optional(),
    database: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    trustServerCertificate: z.boolean().optional(),
  })
  .strict();

export const analysisOptionsSchema = z
  .object({
    testOnly: z.boolean().default(false),
    analyzeDataQuality: z.boolean().default(false),
    detectSensitiveData: z.boolean().default(true),
    maxTablesForQualityAnalysis: z.number().int().min(0).max(1000).default(5),
    schemas: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export const extractionRequestSchema = z
  .object({
    connection: connectionInputSchema,
    options: analysisOptionsSchema.default({}),
  })
  .strict();

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * @throws ExtractionError INVALID_CONFIG or UNSUPPORTED_DIALECT
 */
export function parseConnectionConfig(input: unknown): ConnectionConfig {
  const result = connectionInputSchema.safeParse(input);
  if (!result.success) {
    throw new ExtractionError({
      code: 'INVALID_CONFIG',
      message: formatZodIssues('Invalid connection config', result.error),
    });
  }
  return validateConnectionConfig(result.data);
}

/**
 * @throws ExtractionError INVALID_CONFIG
 */
export function parseAnalysisOptions(input: unknown): AnalysisOptions {
  const result = analysisOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ExtractionError({
      code: 'INVALID_CONFIG',
      message: formatZodIssues('Invalid analysis options', result.error),
    });
  }
  return result.data;
}

/**
 * Validate a `{ connection, options }` request body
 * @throws ExtractionError INVALID_CONFIG or UNSUPPORTED_DIALECT
 */
export function parseExtractionRequest(input: unknown): ExtractionRequest {
  const result = extractionRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ExtractionError({
      code: 'INVALID_CONFIG',
      message: formatZodIssues('Invalid extraction request', result.error),
    });
  }
  return {
    connection: validateConnectionConfig(result.data.connection),
    options: result.data.options,
  };
}
