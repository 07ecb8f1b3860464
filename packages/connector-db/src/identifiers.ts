/**
 * Identifier quoting per dialect
 *
 * Catalog values (schema, table, column names) are passed as bound
 * parameters wherever the SQL allows it. Identifiers that must be spliced
 * into the statement text go through these helpers instead.
 */

import type { Dialect } from '@schemalens/core';

const QUOTES: Record<Dialect, { open: string; close: string }> = {
  postgresql: { open: '"', close: '"' },
  sqlite: { open: '"', close: '"' },
  mysql: { open: '`', close: '`' },
  mssql: { open: '[', close: ']' },
};

/**
 * Quote an identifier, doubling the closing quote character so the
 * name cannot terminate the quoted region early
 */
export function quoteIdentifier(dialect: Dialect, name: string): string {
  if (name.includes('\0')) {
    throw new Error('Identifier contains a NUL character');
  }
  const { open, close } = QUOTES[dialect];
  return `${open}${name.split(close).join(close + close)}${close}`;
}

export function qualifiedName(dialect: Dialect, schema: string, table: string): string {
  return `${quoteIdentifier(dialect, schema)}.${quoteIdentifier(dialect, table)}`;
}

export function countFunction(dialect: Dialect): string {
  // COUNT returns int on SQL Server and overflows past 2^31 rows
  return dialect === 'mssql' ? 'COUNT_BIG' : 'COUNT';
}

// Types without an equality operator, so COUNT(DISTINCT ...) rejects them
const POSTGRES_TEXT_CAST = new Set([
  'json',
  'xml',
  'point',
  'line',
  'lseg',
  'box',
  'path',
  'polygon',
  'circle',
]);
const MSSQL_NVARCHAR_CAST = new Set(['text', 'ntext', 'xml']);
const MSSQL_SPATIAL = new Set(['geography', 'geometry']);

/**
 * Expression for `quotedColumn` that COUNT(DISTINCT ...) accepts
 */
export function comparableExpression(dialect: Dialect, quotedColumn: string, dataType: string): string {
  const type = dataType.trim().toLowerCase();

  switch (dialect) {
    case 'postgresql':
      return POSTGRES_TEXT_CAST.has(type) ? `${quotedColumn}::text` : quotedColumn;
    case 'mssql':
      if (MSSQL_NVARCHAR_CAST.has(type)) return `CAST(${quotedColumn} AS NVARCHAR(MAX))`;
      if (type === 'image') return `CAST(${quotedColumn} AS VARBINARY(MAX))`;
      if (MSSQL_SPATIAL.has(type)) return `${quotedColumn}.STAsText()`;
      return quotedColumn;
    case 'mysql':
    case 'sqlite':
      return quotedColumn;
  }
}
