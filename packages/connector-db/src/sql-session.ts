/**
 * Shared behaviour for the dialect sessions
 *
 * Subclasses supply the driver calls (open, run, release) and the catalog
 * SQL; this class owns the lifecycle and turns every driver exception into
 * an ExtractionError.
 */

import {
  DIALECT_LABELS,
  ExtractionError,
  errorMessage,
  type ColumnMetadata,
  type DatabaseSession,
  type Dialect,
  type ForeignKeyMetadata,
  type IndexMetadata,
  type QueryResult,
  type SessionOptions,
} from '@schemalens/core';
import { comparableExpression, countFunction, qualifiedName, quoteIdentifier } from './identifiers.js';

/** Driver error `code`, when the driver sets one */
export function driverErrorCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' || typeof code === 'number') return code;
  }
  return undefined;
}

/** `failed` sessions may still hold driver resources until close() */
type SessionState = 'new' | 'open' | 'failed' | 'closed';

export abstract class SqlSession implements DatabaseSession {
  abstract readonly dialect: Dialect;

  private state: SessionState = 'new';

  constructor(protected readonly options: SessionOptions = {}) {}

  /** Establish the connection (or prove the pool can hand one out) */
  protected abstract open(): Promise<void>;

  protected abstract run(sql: string, params: unknown[]): Promise<QueryResult>;

  protected abstract release(): Promise<void>;

  /** Whether a driver error means the statement hit its timeout */
  protected abstract isTimeoutError(error: unknown): boolean;

  abstract getSchemas(): Promise<string[]>;
  abstract getTables(schema: string): Promise<string[]>;
  abstract getColumns(schema: string, table: string): Promise<ColumnMetadata[]>;
  abstract getPrimaryKeys(schema: string, table: string): Promise<string[]>;
  abstract getForeignKeys(schema: string, table: string): Promise<ForeignKeyMetadata[]>;
  abstract getIndexes(schema: string, table: string): Promise<IndexMetadata[]>;

  get isOpen(): boolean {
    return this.state === 'open';
  }

  async connect(): Promise<void> {
    if (this.state === 'open') return;
    if (this.state !== 'new') {
      throw new ExtractionError({ code: 'INTERNAL', message: `Cannot reconnect a ${this.state} session` });
    }

    try {
      await this.open();
      this.state = 'open';
    } catch (error) {
      this.state = 'failed';
      throw new ExtractionError({
        code: 'CONNECTION_FAILED',
        message: `${DIALECT_LABELS[this.dialect]} connection failed: ${errorMessage(error)}`,
        suggestion: 'Check host, port, database, username and password, and that the server is reachable.',
        cause: error,
      });
    }
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    if (this.state !== 'open') {
      throw new ExtractionError({
        code: 'INTERNAL',
        message: this.state === 'new' ? 'Cannot query a session before connect()' : `Cannot query a ${this.state} session`,
      });
    }

    try {
      return await this.run(sql, params);
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      const timedOut = this.isTimeoutError(error);
      throw new ExtractionError({
        code: timedOut ? 'QUERY_TIMEOUT' : 'QUERY_FAILED',
        message: timedOut ? `Query timed out: ${errorMessage(error)}` : `Query failed: ${errorMessage(error)}`,
        cause: error,
      });
    }
  }

  quoteIdentifier(name: string): string {
    return quoteIdentifier(this.dialect, name);
  }

  qualifiedName(schema: string, table: string): string {
    return qualifiedName(this.dialect, schema, table);
  }

  comparableExpression(quotedColumn: string, dataType: string): string {
    return comparableExpression(this.dialect, quotedColumn, dataType);
  }

  countFunction(): string {
    return countFunction(this.dialect);
  }

  async close(): Promise<void> {
    if (this.state === 'closed') return;
    const needsRelease = this.state !== 'new';
    this.state = 'closed';
    if (needsRelease) {
      await this.release();
    }
  }
}
