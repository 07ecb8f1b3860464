/**
 * SQLite session
 *
 * better-sqlite3 is synchronous; the async surface is kept so the pipeline
 * treats every dialect alike. Files are opened read-only and must exist.
 * The catalog comes from PRAGMA table-valued functions, which take the
 * attached database name as their last argument.
 */

import Database from 'better-sqlite3';
import {
  readBoolean,
  readCount,
  readNullableString,
  readString,
  type ColumnMetadata,
  type ForeignKeyMetadata,
  type IndexMetadata,
  type QueryResult,
  type Row,
  type SessionOptions,
  type SqliteConnection,
} from '@schemalens/core';
import { SqlSession } from '../sql-session.js';
import { columnNames } from '../catalog-rows.js';

const IN_MEMORY = ':memory:';

export class SqliteSession extends SqlSession {
  override readonly dialect = 'sqlite' as const;
  private db: Database.Database | undefined;

  constructor(
    private readonly config: SqliteConnection,
    options: SessionOptions = {}
  ) {
    super(options);
  }

  protected override async open(): Promise<void> {
    const inMemory = this.config.database === IN_MEMORY;
    this.db = new Database(this.config.database, {
      readonly: !inMemory,
      fileMustExist: !inMemory,
      timeout: this.options.connectTimeoutMs,
    });
  }

  protected override async run(sql: string, params: unknown[]): Promise<QueryResult> {
    if (!this.db) {
      throw new Error('SQLite database is not open');
    }
    const statement = this.db.prepare<unknown[], Row>(sql);
    if (statement.reader) {
      const rows = statement.all(...params);
      return { rows, rowCount: rows.length };
    }
    const info = statement.run(...params);
    return { rows: [], rowCount: info.changes };
  }

  protected override async release(): Promise<void> {
    this.db?.close();
    this.db = undefined;
  }

  protected override isTimeoutError(): boolean {
    return false;
  }

  override async getSchemas(): Promise<string[]> {
    const { rows } = await this.query("SELECT name FROM pragma_database_list WHERE name <> 'temp' ORDER BY seq");
    return columnNames(rows, 'name');
  }

  override async getTables(schema: string): Promise<string[]> {
    const { rows } = await this.query(
      `SELECT name FROM ${this.quoteIdentifier(schema)}.sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\'`
    );
    return columnNames(rows, 'name');
  }

  override async getColumns(schema: string, table: string): Promise<ColumnMetadata[]> {
    const { rows } = await this.query(
      'SELECT name, type, "notnull" AS not_null, dflt_value, pk FROM pragma_table_info(?, ?) ORDER BY cid',
      [table, schema]
    );
    return rows.map((row) => ({
      name: readString(row, 'name'),
      dataType: readString(row, 'type'),
      // INTEGER PRIMARY KEY aliases the rowid and reports notnull = 0
      nullable: !readBoolean(row, 'not_null') && readCount(row, 'pk') === 0,
      defaultValue: readNullableString(row, 'dflt_value'),
    }));
  }

  override async getPrimaryKeys(schema: string, table: string): Promise<string[]> {
    const { rows } = await this.query(
      'SELECT name FROM pragma_table_info(?, ?) WHERE pk > 0 ORDER BY pk',
      [table, schema]
    );
    return columnNames(rows, 'name');
  }

  /**
   * SQLite foreign keys are unnamed and never leave their database.
   * A reference without target columns points at the parent's primary key.
   */
  override async getForeignKeys(schema: string, table: string): Promise<ForeignKeyMetadata[]> {
    const { rows } = await this.query(
      'SELECT id, seq, "table" AS ref_table, "from" AS column_name, "to" AS ref_column FROM pragma_foreign_key_list(?, ?) ORDER BY id, seq',
      [table, schema]
    );

    const foreignKeys: ForeignKeyMetadata[] = [];
    const parentKeys = new Map<string, string[]>();
    for (const row of rows) {
      const refTable = readString(row, 'ref_table');
      let refColumn = readNullableString(row, 'ref_column');
      if (refColumn === null) {
        let keys = parentKeys.get(refTable);
        if (!keys) {
          keys = await this.getPrimaryKeys(schema, refTable);
          parentKeys.set(refTable, keys);
        }
        refColumn = keys[readCount(row, 'seq')] ?? '';
      }
      foreignKeys.push({
        name: null,
        column: readString(row, 'column_name'),
        refSchema: schema,
        refTable,
        refColumn,
      });
    }
    return foreignKeys;
  }

  override async getIndexes(schema: string, table: string): Promise<IndexMetadata[]> {
    const { rows } = await this.query(
      `SELECT name, "unique" AS is_unique FROM pragma_index_list(?, ?)
       WHERE origin <> 'pk' AND name NOT LIKE 'sqlite\\_autoindex\\_%' ESCAPE '\\'
       ORDER BY name`,
      [table, schema]
    );

    const indexes: IndexMetadata[] = [];
    for (const row of rows) {
      const name = readString(row, 'name');
      const { rows: columns } = await this.query(
        'SELECT name FROM pragma_index_info(?, ?) WHERE name IS NOT NULL ORDER BY seqno',
        [name, schema]
      );
      indexes.push({ name, columns: columnNames(columns, 'name'), unique: readBoolean(row, 'is_unique') });
    }
    return indexes;
  }
}
