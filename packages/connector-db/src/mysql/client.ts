/**
 * MySQL session
 *
 * Wrapper around mysql2/promise. INFORMATION_SCHEMA column names come back
 * upper-case on MySQL 8, so every selected column is aliased.
 */

import mysql, { type Pool, type RowDataPacket } from 'mysql2/promise';
import {
  readString,
  type ColumnMetadata,
  type ForeignKeyMetadata,
  type IndexMetadata,
  type QueryResult,
  type ServerConnection,
  type SessionOptions,
} from '@schemalens/core';
import { SqlSession, driverErrorCode } from '../sql-session.js';
import { columnNames, groupIndexes, toColumn, toForeignKey } from '../catalog-rows.js';

/** Client-side timeout, and the server's max_execution_time (ER_QUERY_TIMEOUT) */
const TIMEOUT_CODES = new Set<string | number>(['PROTOCOL_SEQUENCE_TIMEOUT', 'ER_QUERY_TIMEOUT', 3024]);

const SYSTEM_SCHEMAS = ['mysql', 'performance_schema', 'information_schema', 'sys'];

const SCHEMAS_SQL = `
  SELECT SCHEMA_NAME AS schema_name
  FROM INFORMATION_SCHEMA.SCHEMATA
  WHERE SCHEMA_NAME NOT IN (${SYSTEM_SCHEMAS.map((name) => `'${name}'`).join(', ')})
  ORDER BY SCHEMA_NAME
`;

const TABLES_SQL = `
  SELECT TABLE_NAME AS table_name
  FROM INFORMATION_SCHEMA.TABLES
  WHERE TABLE_SCHEMA = ? AND TABLE_TYPE = 'BASE TABLE'
  ORDER BY TABLE_NAME
`;

const COLUMNS_SQL = `
  SELECT
    COLUMN_NAME AS column_name,
    DATA_TYPE AS data_type,
    IS_NULLABLE AS is_nullable,
    COLUMN_DEFAULT AS column_default,
    COLUMN_COMMENT AS column_comment
  FROM INFORMATION_SCHEMA.COLUMNS
  WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?
  ORDER BY ORDINAL_POSITION
`;

const PRIMARY_KEYS_SQL = `
  SELECT COLUMN_NAME AS column_name
  FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE
  WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ? AND CONSTRAINT_NAME = 'PRIMARY'
  ORDER BY ORDINAL_POSITION
`;

const FOREIGN_KEYS_SQL = `
  SELECT
    CONSTRAINT_NAME AS constraint_name,
    COLUMN_NAME AS column_name,
    REFERENCED_TABLE_SCHEMA AS ref_schema,
    REFERENCED_TABLE_NAME AS ref_table,
    REFERENCED_COLUMN_NAME AS ref_column
  FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE
  WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ? AND REFERENCED_TABLE_NAME IS NOT NULL
  ORDER BY CONSTRAINT_NAME, ORDINAL_POSITION
`;

const INDEXES_SQL = `
  SELECT
    INDEX_NAME AS index_name,
    NON_UNIQUE = 0 AS is_unique,
    COLUMN_NAME AS column_name
  FROM INFORMATION_SCHEMA.STATISTICS
  WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ? AND INDEX_NAME <> 'PRIMARY'
  ORDER BY INDEX_NAME, SEQ_IN_INDEX
`;

export class MySQLSession extends SqlSession {
  override readonly dialect = 'mysql' as const;
  private readonly pool: Pool;

  constructor(config: ServerConnection, options: SessionOptions = {}) {
    super(options);
    this.pool = mysql.createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.username,
      password: config.password,
      connectionLimit: options.maxConnections ?? 4,
      connectTimeout: options.connectTimeoutMs,
      waitForConnections: true,
    });
  }

  protected override async open(): Promise<void> {
    const connection = await this.pool.getConnection();
    connection.release();
  }

  protected override async run(sql: string, params: unknown[]): Promise<QueryResult> {
    const [rows] = await this.pool.execute<RowDataPacket[]>({ sql, timeout: this.options.queryTimeoutMs }, params);
    return { rows, rowCount: rows.length };
  }

  protected override async release(): Promise<void> {
    await this.pool.end();
  }

  protected override isTimeoutError(error: unknown): boolean {
    const code = driverErrorCode(error);
    return code !== undefined && TIMEOUT_CODES.has(code);
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
