/**
 * SchemaIntrospector
 *
 * Walks the catalog of an open session: schemas, then tables, then each
 * table's columns, keys and indexes. Output order is the catalog's order;
 * nothing is re-sorted here.
 */

import {
  ExtractionError,
  errorMessage,
  silentLogger,
  throwIfCancelled,
  type DatabaseSession,
  type Logger,
  type SchemaInfo,
  type SchemaMetadata,
  type TableMetadata,
} from '@schemalens/core';

export interface IntrospectionOptions {
  /** Restrict to these schemas; catalog order is kept */
  schemas?: readonly string[];
  signal?: AbortSignal;
}

/** Codes that keep their meaning when raised during introspection */
const PASSTHROUGH_CODES = new Set(['QUERY_TIMEOUT', 'CANCELLED']);

export class SchemaIntrospector {
  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * @param database - Database name (or sqlite path) recorded on the result
   * @throws ExtractionError INTROSPECTION_FAILED, QUERY_TIMEOUT or CANCELLED
   */
  async introspect(
    session: DatabaseSession,
    database: string,
    options: IntrospectionOptions = {}
  ): Promise<SchemaMetadata> {
    try {
      const schemaNames = await this.selectSchemas(session, options.schemas);
      const schemas: SchemaInfo[] = [];

      for (const name of schemaNames) {
        throwIfCancelled(options.signal, 'schemaExtraction');
        const tableNames = await session.getTables(name);
        const tables: TableMetadata[] = [];

        for (const table of tableNames) {
          throwIfCancelled(options.signal, 'schemaExtraction');
          tables.push(await this.describeTable(session, name, table));
        }

        this.logger.debug('Introspected schema', { schema: name, tables: tables.length });
        schemas.push({ name, tables });
      }

      const tableCount = schemas.reduce((sum, s) => sum + s.tables.length, 0);
      const columnCount = schemas.reduce(
        (sum, s) => sum + s.tables.reduce((n, t) => n + t.columns.length, 0),
        0
      );

      return {
        dialect: session.dialect,
        database,
        schemas,
        statistics: { schemaCount: schemas.length, tableCount, columnCount },
      };
    } catch (error) {
      throw this.toIntrospectionError(error);
    }
  }

  private async selectSchemas(session: DatabaseSession, filter?: readonly string[]): Promise<string[]> {
    const available = await session.getSchemas();
    if (!filter) {
      return available;
    }

    const missing = filter.filter((name) => !available.includes(name));
    if (missing.length > 0) {
      this.logger.warn('Requested schemas not found', { schemas: missing });
    }
    return available.filter((name) => filter.includes(name));
  }

  private async describeTable(session: DatabaseSession, schema: string, table: string): Promise<TableMetadata> {
    const [columns, primaryKeys, foreignKeys, indexes] = await Promise.all([
      session.getColumns(schema, table),
      session.getPrimaryKeys(schema, table),
      session.getForeignKeys(schema, table),
      session.getIndexes(schema, table),
    ]);
    return { name: table, columns, primaryKeys, foreignKeys, indexes };
  }

  private toIntrospectionError(error: unknown): ExtractionError {
    if (error instanceof ExtractionError && PASSTHROUGH_CODES.has(error.code)) {
      return error;
    }
    return new ExtractionError({
      code: 'INTROSPECTION_FAILED',
      message: `Schema introspection failed: ${errorMessage(error)}`,
      stage: 'schemaExtraction',
      suggestion: 'Check that the user can read the catalog (information_schema / system views).',
      cause: error,
    });
  }
}
