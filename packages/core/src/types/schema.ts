/**
 * Structural metadata produced by schema introspection
 */

import type { Dialect } from './connection.js';

export interface ColumnMetadata {
  name: string;
  /** Declared type as reported by the catalog */
  dataType: string;
  nullable: boolean;
  defaultValue: string | null;
  comment?: string | null;
}

/** One column edge of a foreign key; composite keys produce one edge per column */
export interface ForeignKeyMetadata {
  name: string | null;
  column: string;
  refSchema: string | null;
  refTable: string;
  refColumn: string;
}

export interface IndexMetadata {
  name: string;
  columns: string[];
  unique: boolean;
}

export interface TableMetadata {
  name: string;
  columns: ColumnMetadata[];
  primaryKeys: string[];
  foreignKeys: ForeignKeyMetadata[];
  indexes: IndexMetadata[];
}

export interface SchemaInfo {
  name: string;
  tables: TableMetadata[];
}

export interface SchemaStatistics {
  schemaCount: number;
  tableCount: number;
  columnCount: number;
}

/**
 * Catalog snapshot of one database. Carries no timestamps, so two
 * introspections of an unchanged database compare equal.
 */
export interface SchemaMetadata {
  dialect: Dialect;
  database: string;
  schemas: SchemaInfo[];
  statistics: SchemaStatistics;
}

/** Address of a table inside a SchemaMetadata */
export interface TableRef {
  schema: string;
  table: string;
}
