/**
 * Database session interface
 *
 * Every dialect client implements this. The pipeline only ever talks to a
 * DatabaseSession, never to a driver, so stages stay dialect-agnostic and
 * tests can substitute an in-memory session.
 */

import type { Dialect } from '../types/connection.js';
import type { ColumnMetadata, ForeignKeyMetadata, IndexMetadata } from '../types/schema.js';

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  rowCount: number;
}

/**
 * Catalog queries, one method per kind of metadata. Results come back in the
 * order the catalog query returns them.
 */
export interface CatalogReader {
  /** Non-system schemas */
  getSchemas(): Promise<string[]>;
  /** Base tables in a schema */
  getTables(schema: string): Promise<string[]>;
  getColumns(schema: string, table: string): Promise<ColumnMetadata[]>;
  /** Primary key column names in key order */
  getPrimaryKeys(schema: string, table: string): Promise<string[]>;
  getForeignKeys(schema: string, table: string): Promise<ForeignKeyMetadata[]>;
  getIndexes(schema: string, table: string): Promise<IndexMetadata[]>;
}

export interface DatabaseSession extends CatalogReader {
  readonly dialect: Dialect;

  /**
   * Open the underlying connection (or pool)
   * @throws ExtractionError with code CONNECTION_FAILED
   */
  connect(): Promise<void>;

  /** Trivial round trip (`SELECT 1`) */
  ping(): Promise<void>;

  /**
   * Execute a read query with positional parameters
   * @throws ExtractionError on driver failure
   */
  query(sql: string, params?: unknown[]): Promise<QueryResult>;

  /** Quote an identifier for this dialect, escaping embedded quote characters */
  quoteIdentifier(name: string): string;

  /** Fully qualified, quoted `schema.table` */
  qualifiedName(schema: string, table: string): string;

  /**
   * Expression usable inside COUNT(DISTINCT ...) for a column of the given
   * declared type (some types have no equality operator and need a cast)
   */
  comparableExpression(quotedColumn: string, dataType: string): string;

  /** Row-count aggregate wide enough for any table (`COUNT_BIG` on SQL Server) */
  countFunction(): string;

  /** Release every connection. Safe to call more than once. */
  close(): Promise<void>;
}

export interface SessionOptions {
  /** Upper bound on establishing a connection */
  connectTimeoutMs?: number;
  /** Server-side statement timeout where the driver supports one */
  queryTimeoutMs?: number;
  /** Pool size for drivers that pool */
  maxConnections?: number;
}

/** Builds an unopened session for a connection string */
export type SessionFactory = (connectionUrl: string, options?: SessionOptions) => DatabaseSession;
