/**
 * Aggregate result of one extraction run
 */

import type { ExtractionErrorCode } from '../errors/extraction-error.js';
import type { Dialect } from './connection.js';
import type { SensitiveFinding } from './findings.js';
import type { QualityMetric } from './quality.js';
import type { SchemaMetadata } from './schema.js';

export type ExtractionStatus = 'running' | 'completed' | 'failed';

export const STAGE_NAMES = [
  'connectionTest',
  'schemaExtraction',
  'sensitiveDataDetection',
  'dataQualityAnalysis',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type PipelineState =
  | 'pending'
  | 'testingConnection'
  | 'introspectingSchema'
  | 'classifyingSensitiveData'
  | 'analyzingQuality'
  | 'completed'
  | 'failed';

export type ConnectionTestResult =
  | {
      status: 'success';
      message: string;
      timestamp: string;
      latencyMs: number;
    }
  | {
      status: 'error';
      message: string;
      timestamp: string;
      code: ExtractionErrorCode;
    };

export interface ExecutionSummary {
  totalSteps: number;
  testOnly: boolean;
  schemaCount: number;
  tableCount: number;
  columnCount: number;
  sensitiveColumnCount: number;
  sensitiveCategories: Record<string, number>;
  tablesAnalyzedForQuality: number;
  tablesFailedQuality: number;
  durationMs: number;
}

export interface ExtractionFailure {
  code: ExtractionErrorCode;
  message: string;
  stage?: StageName;
}

export interface ExtractionResult {
  runId: string;
  status: ExtractionStatus;
  state: PipelineState;
  dialect: Dialect;
  database: string;
  /** Append-only audit trail of attempted stages */
  stepsCompleted: StageName[];
  connectionTest: ConnectionTestResult | null;
  schemaMetadata: SchemaMetadata | null;
  sensitiveFindings: SensitiveFinding[] | null;
  qualityMetrics: QualityMetric[] | null;
  executionSummary: ExecutionSummary | null;
  error?: ExtractionFailure;
  startedAt: string;
  finishedAt?: string;
}
