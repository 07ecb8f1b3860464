/**
 * PostgreSQL session
 *
 * Wrapper around a pg Pool. Uses pg_catalog where information_schema
 * loses key order (composite foreign keys, index columns).
 */

import pg from 'pg';
import {
  readString,
  type ColumnMetadata,
  type ForeignKeyMetadata,
  type IndexMetadata,
  type QueryResult,
  type Row,
  type ServerConnection,
  type SessionOptions,
} from '@schemalens/core';
import { SqlSession, driverErrorCode } from '../sql-session.js';
import { columnNames, groupIndexes, toColumn, toForeignKey } from '../catalog-rows.js';

const { Pool } = pg;

/** query_canceled, raised when statement_timeout fires */
const QUERY_CANCELED = '57014';

const SCHEMAS_SQL = `
  SELECT nspname AS schema_name
  FROM pg_catalog.pg_namespace
  WHERE nspname <> 'information_schema' AND nspname NOT LIKE 'pg\\_%'
  ORDER BY nspname
`;

const TABLES_SQL = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1 AND table_type = 'BASE TABLE'
  ORDER BY table_name
`;

const COLUMNS_SQL = `
  SELECT
    c.column_name,
    c.data_type,
    c.is_nullable,
    c.column_default,
    col_description(format('%I.%I', c.table_schema, c.table_name)::regclass, c.ordinal_position) AS column_comment
  FROM information_schema.columns c
  WHERE c.table_schema = $1 AND c.table_name = $2
  ORDER BY c.ordinal_position
`;

const PRIMARY_KEYS_SQL = `
  SELECT kcu.column_name
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_schema = kcu.constraint_schema
   AND tc.constraint_name = kcu.constraint_name
   AND tc.table_name = kcu.table_name
  WHERE tc.constraint_type = 'PRIMARY KEY'
    AND tc.table_schema = $1
    AND tc.table_name = $2
  ORDER BY kcu.ordinal_position
`;

const FOREIGN_KEYS_SQL = `
  SELECT
    con.conname AS constraint_name,
    att.attname AS column_name,
    rns.nspname AS ref_schema,
    rcl.relname AS ref_table,
    ratt.attname AS ref_column
  FROM pg_catalog.pg_constraint con
  JOIN pg_catalog.pg_class cl ON cl.oid = con.conrelid
  JOIN pg_catalog.pg_namespace ns ON ns.oid = cl.relnamespace
  JOIN pg_catalog.pg_class rcl ON rcl.oid = con.confrelid
  JOIN pg_catalog.pg_namespace rns ON rns.oid = rcl.relnamespace
  CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, refattnum, ord)
  JOIN pg_catalog.pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = k.attnum
  JOIN pg_catalog.pg_attribute ratt ON ratt.attrelid = con.confrelid AND ratt.attnum = k.refattnum
  WHERE con.contype = 'f' AND ns.nspname = $1 AND cl.relname = $2
  ORDER BY con.conname, k.ord
`;

const INDEXES_SQL = `
  SELECT
    i.relname AS index_name,
    ix.indisunique AS is_unique,
    a.attname AS column_name
  FROM pg_catalog.pg_index ix
  JOIN pg_catalog.pg_class t ON t.oid = ix.indrelid
  JOIN pg_catalog.pg_namespace n ON n.oid = t.relnamespace
  JOIN pg_catalog.pg_class i ON i.oid = ix.indexrelid
  CROSS JOIN LATERAL unnest(ix.indkey::int2[]) WITH ORDINALITY AS k(attnum, ord)
  JOIN pg_catalog.pg_attribute a ON a.attrelid = t.oid AND a.attnum = k.attnum
  WHERE n.nspname = $1 AND t.relname = $2 AND NOT ix.indisprimary
  ORDER BY i.relname, k.ord
`;

export class PostgresSession extends SqlSession {
  override readonly dialect = 'postgresql' as const;
  private readonly pool: pg.Pool;

  constructor(config: ServerConnection, options: SessionOptions = {}) {
    super(options);
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.username,
      password: config.password,
      max: options.maxConnections ?? 4,
      connectionTimeoutMillis: options.connectTimeoutMs,
      statement_timeout: options.queryTimeoutMs,
      application_name: 'schemalens',
    });
  }

  protected override async open(): Promise<void> {
    const client = await this.pool.connect();
    client.release();
  }

  protected override async run(sql: string, params: unknown[]): Promise<QueryResult> {
    const result = await this.pool.query<Row>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
  }

  protected override async release(): Promise<void> {
    await this.pool.end();
  }

  protected override isTimeoutError(error: unknown): boolean {
    return driverErrorCode(error) === QUERY_CANCELED;
  }

  override async getSchemas(): Promise<string[]> {
    const { rows } = await this.query(SCHEMAS_SQL);
    return columnNames(rows, 'schema_name');
  }

  override async getTables(schema: string): Promise<string[]> {
    const { rows } = await this.query(TABLES_SQL, [schema]);
    return rows.map((row) => readString(row, 'table_name'));
  }

  override async getColumns(schema: string, table: string): Promise<ColumnMetadata[]> {
    const { rows } = await this.query(COLUMNS_SQL, [schema, table]);
    return rows.map(toColumn);
  }

  override async getPrimaryKeys(schema: string, table: string): Promise<string[]> {
    const { rows } = await this.query(PRIMARY_KEYS_SQL, [schema, table]);
    return columnNames(rows);
  }

  override async getForeignKeys(schema: string, table: string): Promise<ForeignKeyMetadata[]> {
    const { rows } = await this.query(FOREIGN_KEYS_SQL, [schema, table]);
    return rows.map(toForeignKey);
  }

  override async getIndexes(schema: string, table: string): Promise<IndexMetadata[]> {
    const { rows } = await this.query(INDEXES_SQL, [schema, table]);
    return groupIndexes(rows);
  }
}
