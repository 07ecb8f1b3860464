/**
 * DataQualityAnalyzer
 *
 * Profiles a bounded selection of tables: row count, then per column the
 * null count and distinct count. Tables run in parallel under a semaphore;
 * a table that fails yields an error entry instead of failing the batch.
 */

import {
  ExtractionError,
  Semaphore,
  errorMessage,
  readCount,
  silentLogger,
  throwIfCancelled,
  withTimeout,
  type ColumnQuality,
  type AnalyzedTableQuality,
  type DatabaseSession,
  type FailedTableQuality,
  type Logger,
  type QualityMetric,
  type SchemaMetadata,
  type TableMetadata,
} from '@schemalens/core';
import { rateTableQuality } from './quality-rating.js';

export const DEFAULT_QUALITY_CONCURRENCY = 4;
export const DEFAULT_TABLE_TIMEOUT_MS = 180_000;

export interface SelectedTable {
  schema: string;
  table: TableMetadata;
}

export interface QualityAnalyzerOptions {
  /** Tables profiled at once (default: 4) */
  concurrency?: number;
  /** Deadline per table (default: 3 minutes) */
  tableTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * First `maxTables` tables in introspection order, across schemas
 */
export function selectTablesForQuality(metadata: SchemaMetadata, maxTables: number): SelectedTable[] {
  const selected: SelectedTable[] = [];
  if (maxTables <= 0) return selected;

  for (const schema of metadata.schemas) {
    for (const table of schema.tables) {
      selected.push({ schema: schema.name, table });
      if (selected.length >= maxTables) return selected;
    }
  }
  return selected;
}

function ratio(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.min(1, Math.max(0, part / whole));
}

export class DataQualityAnalyzer {
  private readonly concurrency: number;
  private readonly tableTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: QualityAnalyzerOptions = {}) {
    this.concurrency = options.concurrency ?? DEFAULT_QUALITY_CONCURRENCY;
    this.tableTimeoutMs = options.tableTimeoutMs ?? DEFAULT_TABLE_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Profile up to `maxTables` tables. In-flight tables are allowed to
   * finish when `signal` fires; tables not yet started are skipped.
   *
   * @returns one entry per selected table, in selection order
   * @throws ExtractionError CANCELLED when `signal` fired
   */
  async analyze(
    session: DatabaseSession,
    metadata: SchemaMetadata,
    maxTables: number,
    signal?: AbortSignal
  ): Promise<QualityMetric[]> {
    const selection = selectTablesForQuality(metadata, maxTables);
    const semaphore = new Semaphore(Math.max(1, Math.min(this.concurrency, selection.length || 1)));

    const results = await Promise.all(
      selection.map(({ schema, table }) =>
        semaphore.use(async (): Promise<QualityMetric | null> => {
          if (signal?.aborted) return null;
          return this.analyzeIsolated(session, schema, table);
        })
      )
    );

    throwIfCancelled(signal, 'dataQualityAnalysis');
    return results.filter((entry): entry is QualityMetric => entry !== null);
  }

  /**
   * Error entries for every table that would have been selected, used when
   * no session could be opened for the stage
   */
  failAll(metadata: SchemaMetadata, maxTables: number, error: unknown): FailedTableQuality[] {
    return selectTablesForQuality(metadata, maxTables).map(({ schema, table }) =>
      this.failedEntry(schema, table.name, error)
    );
  }

  /**
   * Profile one table under the per-table deadline
   * @throws ExtractionError QUERY_TIMEOUT, or the session's query error
   */
  async analyzeTable(session: DatabaseSession, schema: string, table: TableMetadata): Promise<AnalyzedTableQuality> {
    const deadline = Date.now() + this.tableTimeoutMs;
    const timeoutError = () =>
      new ExtractionError({
        code: 'QUERY_TIMEOUT',
        message: `Quality analysis of ${schema}.${table.name} exceeded ${this.tableTimeoutMs}ms`,
        stage: 'dataQualityAnalysis',
      });

    const run = async (): Promise<AnalyzedTableQuality> => {
      const qualified = session.qualifiedName(schema, table.name);
      const count = session.countFunction();
      const countResult = await session.query(`SELECT ${count}(*) AS row_count FROM ${qualified}`);
      const firstRow = countResult.rows[0];
      const rowCount = firstRow ? readCount(firstRow, 'row_count') : 0;

      const columns: ColumnQuality[] = [];
      for (const column of table.columns) {
        if (Date.now() > deadline) throw timeoutError();

        const quoted = session.quoteIdentifier(column.name);
        const distinctExpr = session.comparableExpression(quoted, column.dataType);
        const { rows } = await session.query(
          `SELECT ${count}(*) - ${count}(${quoted}) AS null_count, ${count}(DISTINCT ${distinctExpr}) AS distinct_count FROM ${qualified}`
        );
        const row = rows[0];
        const nullCount = row ? readCount(row, 'null_count') : 0;
        const distinctCount = row ? readCount(row, 'distinct_count') : 0;

        columns.push({
          column: column.name,
          dataType: column.dataType,
          nullCount,
          nullPercentage: rowCount > 0 ? (nullCount / rowCount) * 100 : 0,
          distinctCount,
          uniquenessRatio: ratio(distinctCount, rowCount),
        });
      }

      return {
        status: 'analyzed',
        schema,
        table: table.name,
        rowCount,
        columns,
        qualityRating: rateTableQuality(columns),
        analyzedAt: this.now().toISOString(),
      };
    };

    return withTimeout(run(), this.tableTimeoutMs, timeoutError);
  }

  private async analyzeIsolated(session: DatabaseSession, schema: string, table: TableMetadata): Promise<QualityMetric> {
    try {
      return await this.analyzeTable(session, schema, table);
    } catch (error) {
      this.logger.warn('Quality analysis failed for table', {
        schema,
        table: table.name,
        error: errorMessage(error),
      });
      return this.failedEntry(schema, table.name, error);
    }
  }

  private failedEntry(schema: string, table: string, error: unknown): FailedTableQuality {
    const timedOut = error instanceof ExtractionError && error.code === 'QUERY_TIMEOUT';
    return {
      status: 'error',
      schema,
      table,
      error: {
        code: timedOut ? 'QUERY_TIMEOUT' : 'PARTIAL_TABLE_FAILURE',
        message: `Quality analysis failed for ${schema}.${table}: ${errorMessage(error)}`,
      },
      analyzedAt: this.now().toISOString(),
    };
  }
}
