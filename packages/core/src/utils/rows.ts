/**
 * Narrowing helpers for driver rows
 *
 * Drivers disagree on how they hand back catalog values: pg returns COUNT(*)
 * as a string, mysql2 returns booleans as 0/1, information_schema reports
 * nullability as 'YES'/'NO'. These helpers read a field and normalise it.
 */

import type { Row } from '../interfaces/session.js';

export function readString(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}

export function readNullableString(row: Row, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return readString(row, key);
}

export function readBoolean(row: Row, key: string): boolean {
  const value = row[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value) !== 0;
  if (typeof value === 'string') {
    return ['yes', 'y', 'true', 't', '1'].includes(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Read a non-negative integer count
 * @throws Error when the value is not numeric
 */
export function readCount(row: Row, key: string): number {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  throw new Error(`Expected a numeric value for "${key}", got ${value === null ? 'null' : typeof value}`);
}
