/**
 * Error taxonomy for the extraction pipeline
 * Messages end up in ExtractionResult.error, so keep them readable
 */

import type { StageName } from '../types/result.js';

export type ExtractionErrorCode =
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_DIALECT'
  | 'CONNECTION_FAILED'
  | 'INTROSPECTION_FAILED'
  | 'QUERY_TIMEOUT'
  | 'QUERY_FAILED'
  | 'PARTIAL_TABLE_FAILURE'
  | 'CANCELLED'
  | 'INTERNAL';

export interface ExtractionErrorDetails {
  /** Error code for programmatic handling */
  code: ExtractionErrorCode;
  /** Human-readable message */
  message: string;
  /** Stage that raised the error */
  stage?: StageName;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: unknown;
  /** Additional context */
  context?: Record<string, unknown>;
}

/** Codes that stop the remaining pipeline when raised by probe or introspection */
const GATING_CODES: ReadonlySet<ExtractionErrorCode> = new Set([
  'INVALID_CONFIG',
  'UNSUPPORTED_DIALECT',
  'CONNECTION_FAILED',
  'INTROSPECTION_FAILED',
  'QUERY_TIMEOUT',
  'CANCELLED',
  'INTERNAL',
]);

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly stage?: StageName;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ExtractionErrorDetails) {
    super(details.message);
    this.name = 'ExtractionError';
    this.code = details.code;
    this.stage = details.stage;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause !== undefined) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, ExtractionError);
  }

  get gating(): boolean {
    return GATING_CODES.has(this.code);
  }

  /**
   * Structured, actionable message for humans and tool callers
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.stage) {
      parts.push(`Stage: ${this.stage}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stage: this.stage,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper to wrap unknown errors as ExtractionError
 */
export function wrapError(
  error: unknown,
  defaultCode: ExtractionErrorCode = 'INTERNAL',
  stage?: StageName
): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }

  return new ExtractionError({
    code: defaultCode,
    message: errorMessage(error),
    stage,
    cause: error,
  });
}
