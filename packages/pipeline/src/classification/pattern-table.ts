/**
 * Sensitive-column pattern table
 *
 * Category keywords live in data/sensitive-patterns.json so categories can
 * be added or reordered without touching the classifier. Lower `priority`
 * values are checked first.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ExtractionError, formatZodIssues } from '@schemalens/core';

const keywordList = z.array(z.string().trim().toLowerCase().min(1)).min(1);

export const patternTableSchema = z.object({
  version: z.number().int().positive(),
  categories: z
    .array(
      z.object({
        category: z.string().min(1),
        priority: z.number().int(),
        keywords: keywordList,
      })
    )
    .min(1)
    .refine((categories) => new Set(categories.map((c) => c.category)).size === categories.length, {
      message: 'Category names must be unique',
    }),
  /** Low-confidence matches on name plus declared type */
  typeHints: z
    .array(
      z.object({
        category: z.string().min(1),
        keywords: keywordList,
        dataTypes: keywordList,
      })
    )
    .default([]),
});

export type PatternTable = z.infer<typeof patternTableSchema>;
export type PatternTableInput = z.input<typeof patternTableSchema>;

export const DEFAULT_PATTERN_TABLE_URL = new URL('../../data/sensitive-patterns.json', import.meta.url);

/**
 * Validate a pattern table
 * @throws ExtractionError INVALID_CONFIG
 */
export function parsePatternTable(input: unknown): PatternTable {
  const result = patternTableSchema.safeParse(input);
  if (!result.success) {
    throw new ExtractionError({
      code: 'INVALID_CONFIG',
      message: formatZodIssues('Invalid sensitive pattern table', result.error),
    });
  }
  return result.data;
}

/**
 * Read and validate a pattern table from disk
 * @throws ExtractionError INVALID_CONFIG
 */
export function loadPatternTable(path: string | URL = DEFAULT_PATTERN_TABLE_URL): PatternTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ExtractionError({
      code: 'INVALID_CONFIG',
      message: `Failed to read sensitive pattern table: ${String(path)}`,
      cause: error,
    });
  }
  return parsePatternTable(raw);
}

let defaultTable: PatternTable | undefined;

/** The bundled table, read once */
export function defaultPatternTable(): PatternTable {
  defaultTable ??= loadPatternTable();
  return defaultTable;
}
