import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { SqliteSession } from '../src/index.js';

let tmpDir = '';
let dbPath = '';

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'connector-db-'));
  dbPath = join(tmpDir, 'shop.db');

  const db = new Database(dbPath);
  db.exec(`
    CREATE TABLE customers (
      id INTEGER PRIMARY KEY,
      email TEXT NOT NULL UNIQUE,
      full_name TEXT,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL REFERENCES customers(id),
      total NUMERIC,
      status TEXT DEFAULT 'new'
    );
    CREATE INDEX idx_orders_status ON orders(status, total);
    CREATE TABLE order_items (
      order_id INTEGER,
      line_no INTEGER,
      sku TEXT,
      PRIMARY KEY (order_id, line_no),
      FOREIGN KEY (order_id) REFERENCES orders
    );
    INSERT INTO customers (id, email, full_name) VALUES (1, 'a@example.com', 'Ada'), (2, 'b@example.com', NULL);
  `);
  db.close();
});

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

async function openSession(): Promise<SqliteSession> {
  const session = new SqliteSession({ dialect: 'sqlite', database: dbPath });
  await session.connect();
  return session;
}

describe('SqliteSession catalog', () => {
  it('lists the main database and its tables in creation order', async () => {
    const session = await openSession();
    try {
      expect(await session.getSchemas()).toEqual(['main']);
      expect(await session.getTables('main')).toEqual(['customers', 'orders', 'order_items']);
    } finally {
      await session.close();
    }
  });

  it('reads columns with declared types, nullability and defaults', async () => {
    const session = await openSession();
    try {
      expect(await session.getColumns('main', 'customers')).toEqual([
        { name: 'id', dataType: 'INTEGER', nullable: false, defaultValue: null },
        { name: 'email', dataType: 'TEXT', nullable: false, defaultValue: null },
        { name: 'full_name', dataType: 'TEXT', nullable: true, defaultValue: null },
        { name: 'created_at', dataType: 'TIMESTAMP', nullable: true, defaultValue: 'CURRENT_TIMESTAMP' },
      ]);
      const orders = await session.getColumns('main', 'orders');
      expect(orders[3]).toEqual({ name: 'status', dataType: 'TEXT', nullable: true, defaultValue: "'new'" });
    } finally {
      await session.close();
    }
  });

  it('returns composite primary keys in key order', async () => {
    const session = await openSession();
    try {
      expect(await session.getPrimaryKeys('main', 'order_items')).toEqual(['order_id', 'line_no']);
      expect(await session.getPrimaryKeys('main', 'customers')).toEqual(['id']);
    } finally {
      await session.close();
    }
  });

  it('resolves foreign keys, including implicit references to the parent key', async () => {
    const session = await openSession();
    try {
      expect(await session.getForeignKeys('main', 'orders')).toEqual([
        { name: null, column: 'customer_id', refSchema: 'main', refTable: 'customers', refColumn: 'id' },
      ]);
      expect(await session.getForeignKeys('main', 'order_items')).toEqual([
        { name: null, column: 'order_id', refSchema: 'main', refTable: 'orders', refColumn: 'id' },
      ]);
    } finally {
      await session.close();
    }
  });

  it('lists named indexes and skips automatic ones', async () => {
    const session = await openSession();
    try {
      expect(await session.getIndexes('main', 'orders')).toEqual([
        { name: 'idx_orders_status', columns: ['status', 'total'], unique: false },
      ]);
      expect(await session.getIndexes('main', 'customers')).toEqual([]);
    } finally {
      await session.close();
    }
  });
});

describe('SqliteSession queries', () => {
  it('runs read queries against quoted names', async () => {
    const session = await openSession();
    try {
      const table = session.qualifiedName('main', 'customers');
      const column = session.quoteIdentifier('full_name');
      const { rows } = await session.query(
        `SELECT COUNT(*) AS row_count, COUNT(*) - COUNT(${column}) AS null_count FROM ${table}`
      );
      expect(rows).toEqual([{ row_count: 2, null_count: 1 }]);
    } finally {
      await session.close();
    }
  });

  it('opens files read-only', async () => {
    const session = await openSession();
    try {
      await expect(session.query('DELETE FROM customers')).rejects.toMatchObject({ code: 'QUERY_FAILED' });
    } finally {
      await session.close();
    }
  });

  it('fails to connect when the file does not exist', async () => {
    const session = new SqliteSession({ dialect: 'sqlite', database: join(tmpDir, 'missing.db') });
    await expect(session.connect()).rejects.toMatchObject({ code: 'CONNECTION_FAILED' });
    await session.close();
  });
});
