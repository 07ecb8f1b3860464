import type {
  ExecutionSummary,
  QualityMetric,
  SchemaMetadata,
  SensitiveDataReport,
  StageName,
} from '@schemalens/core';

export interface SummaryInput {
  stepsCompleted: readonly StageName[];
  testOnly: boolean;
  schemaMetadata: SchemaMetadata | null;
  sensitive: SensitiveDataReport | null;
  qualityMetrics: readonly QualityMetric[] | null;
  durationMs: number;
}

/** Totals over whatever sub-results the run produced */
export function buildExecutionSummary(input: SummaryInput): ExecutionSummary {
  const stats = input.schemaMetadata?.statistics;
  const quality = input.qualityMetrics ?? [];

  return {
    totalSteps: input.stepsCompleted.length,
    testOnly: input.testOnly,
    schemaCount: stats?.schemaCount ?? 0,
    tableCount: stats?.tableCount ?? 0,
    columnCount: stats?.columnCount ?? 0,
    sensitiveColumnCount: input.sensitive?.findings.length ?? 0,
    sensitiveCategories: { ...(input.sensitive?.summary ?? {}) },
    tablesAnalyzedForQuality: quality.filter((m) => m.status === 'analyzed').length,
    tablesFailedQuality: quality.filter((m) => m.status === 'error').length,
    durationMs: input.durationMs,
  };
}
