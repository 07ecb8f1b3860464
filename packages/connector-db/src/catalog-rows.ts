import {
  readBoolean,
  readNullableString,
  readString,
  type ColumnMetadata,
  type ForeignKeyMetadata,
  type IndexMetadata,
  type Row,
} from '@schemalens/core';

/**
 * Map a catalog row with `column_name`, `data_type`, `is_nullable`,
 * `column_default` and optionally `column_comment`
 */
export function toColumn(row: Row): ColumnMetadata {
  const comment = readNullableString(row, 'column_comment');
  return {
    name: readString(row, 'column_name'),
    dataType: readString(row, 'data_type'),
    nullable: readBoolean(row, 'is_nullable'),
    defaultValue: readNullableString(row, 'column_default'),
    ...(comment ? { comment } : {}),
  };
}

/**
 * Map a catalog row with `constraint_name`, `column_name`, `ref_schema`,
 * `ref_table` and `ref_column`
 */
export function toForeignKey(row: Row): ForeignKeyMetadata {
  return {
    name: readNullableString(row, 'constraint_name'),
    column: readString(row, 'column_name'),
    refSchema: readNullableString(row, 'ref_schema'),
    refTable: readString(row, 'ref_table'),
    refColumn: readString(row, 'ref_column'),
  };
}

/**
 * Fold one-row-per-indexed-column results (`index_name`, `is_unique`,
 * `column_name`) into indexes. Rows must be ordered by index, then by
 * key position; index order follows first appearance.
 */
export function groupIndexes(rows: Row[]): IndexMetadata[] {
  const byName = new Map<string, IndexMetadata>();

  for (const row of rows) {
    const name = readString(row, 'index_name');
    const column = readNullableString(row, 'column_name');
    let index = byName.get(name);
    if (!index) {
      index = { name, columns: [], unique: readBoolean(row, 'is_unique') };
      byName.set(name, index);
    }
    if (column !== null) {
      index.columns.push(column);
    }
  }

  return [...byName.values()];
}

export function columnNames(rows: Row[], key = 'column_name'): string[] {
  return rows.map((row) => readString(row, key));
}
