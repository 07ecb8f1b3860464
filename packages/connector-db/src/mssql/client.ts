/**
 * SQL Server session
 *
 * Wrapper around an mssql ConnectionPool. Positional parameters are bound
 * as @p1, @p2, ... in statement order.
 */

import sql, { type ConnectionPool } from 'mssql';
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

const SCHEMAS_SQL = `
  SELECT name AS schema_name
  FROM sys.schemas
  WHERE name NOT IN ('sys', 'INFORMATION_SCHEMA', 'guest') AND name NOT LIKE 'db[_]%'
  ORDER BY name
`;

const TABLES_SQL = `
  SELECT TABLE_NAME AS table_name
  FROM INFORMATION_SCHEMA.TABLES
  WHERE TABLE_SCHEMA = @p1 AND TABLE_TYPE = 'BASE TABLE'
  ORDER BY TABLE_NAME
`;

const COLUMNS_SQL = `
  SELECT
    c.COLUMN_NAME AS column_name,
    c.DATA_TYPE AS data_type,
    c.IS_NULLABLE AS is_nullable,
    c.COLUMN_DEFAULT AS column_default,
    CAST(ep.value AS NVARCHAR(4000)) AS column_comment
  FROM INFORMATION_SCHEMA.COLUMNS c
  LEFT JOIN sys.extended_properties ep
    ON ep.class = 1
   AND ep.name = 'MS_Description'
   AND ep.major_id = OBJECT_ID(QUOTENAME(c.TABLE_SCHEMA) + '.' + QUOTENAME(c.TABLE_NAME))
   AND ep.minor_id = COLUMNPROPERTY(ep.major_id, c.COLUMN_NAME, 'ColumnId')
  WHERE c.TABLE_SCHEMA = @p1 AND c.TABLE_NAME = @p2
  ORDER BY c.ORDINAL_POSITION
`;

const PRIMARY_KEYS_SQL = `
  SELECT kcu.COLUMN_NAME AS column_name
  FROM INFORMATION_SCHEMA.TABLE_CONSTRAINTS tc
  JOIN INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu
    ON tc.CONSTRAINT_SCHEMA = kcu.CONSTRAINT_SCHEMA
   AND tc.CONSTRAINT_NAME = kcu.CONSTRAINT_NAME
  WHERE tc.CONSTRAINT_TYPE = 'PRIMARY KEY'
    AND tc.TABLE_SCHEMA = @p1
    AND tc.TABLE_NAME = @p2
  ORDER BY kcu.ORDINAL_POSITION
`;

const FOREIGN_KEYS_SQL = `
  SELECT
    fk.name AS constraint_name,
    pc.name AS column_name,
    rs.name AS ref_schema,
    rt.name AS ref_table,
    rc.name AS ref_column
  FROM sys.foreign_keys fk
  JOIN sys.foreign_key_columns fkc ON fkc.constraint_object_id = fk.object_id
  JOIN sys.tables t ON t.object_id = fk.parent_object_id
  JOIN sys.schemas s ON s.schema_id = t.schema_id
  JOIN sys.columns pc ON pc.object_id = fkc.parent_object_id AND pc.column_id = fkc.parent_column_id
  JOIN sys.tables rt ON rt.object_id = fkc.referenced_object_id
  JOIN sys.schemas rs ON rs.schema_id = rt.schema_id
  JOIN sys.columns rc ON rc.object_id = fkc.referenced_object_id AND rc.column_id = fkc.referenced_column_id
  WHERE s.name = @p1 AND t.name = @p2
  ORDER BY fk.name, fkc.constraint_column_id
`;

const INDEXES_SQL = `
  SELECT
    i.name AS index_name,
    i.is_unique AS is_unique,
    c.name AS column_name
  FROM sys.indexes i
  JOIN sys.tables t ON t.object_id = i.object_id
  JOIN sys.schemas s ON s.schema_id = t.schema_id
  JOIN sys.index_columns ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id
  JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
  WHERE s.name = @p1
    AND t.name = @p2
    AND i.is_primary_key = 0
    AND i.name IS NOT NULL
    AND ic.is_included_column = 0
  ORDER BY i.name, ic.key_ordinal
`;

export class MSSQLSession extends SqlSession {
  override readonly dialect = 'mssql' as const;
  private readonly pool: ConnectionPool;

  constructor(config: ServerConnection, options: SessionOptions = {}) {
    super(options);
    this.pool = new sql.ConnectionPool({
      server: config.host,
      port: config.port,
      database: config.database,
      user: config.username,
      password: config.password,
      connectionTimeout: options.connectTimeoutMs,
      requestTimeout: options.queryTimeoutMs,
      pool: { max: options.maxConnections ?? 4 },
      options: { encrypt: true, trustServerCertificate: config.trustServerCertificate ?? false },
    });
  }

  protected override async open(): Promise<void> {
    await this.pool.connect();
  }

  protected override async run(text: string, params: unknown[]): Promise<QueryResult> {
    const request = this.pool.request();
    params.forEach((value, index) => {
      request.input(`p${index + 1}`, value);
    });
    const result = await request.query<Row>(text);
    const rows: Row[] = result.recordset ?? [];
    return { rows, rowCount: rows.length };
  }

  protected override async release(): Promise<void> {
    await this.pool.close();
  }

  protected override isTimeoutError(error: unknown): boolean {
    return driverErrorCode(error) === 'ETIMEOUT';
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
