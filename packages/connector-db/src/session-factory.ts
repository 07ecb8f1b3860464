import { parseConnectionUrl, type DatabaseSession, type SessionFactory, type SessionOptions } from '@schemalens/core';
import { PostgresSession } from './postgresql/index.js';
import { MySQLSession } from './mysql/index.js';
import { MSSQLSession } from './mssql/index.js';
import { SqliteSession } from './sqlite/index.js';

/**
 * Create an unopened session for a connection string built by
 * buildConnectionUrl. Callers own the session: connect(), then close().
 *
 * @throws ExtractionError INVALID_CONFIG or UNSUPPORTED_DIALECT
 */
export const createSession: SessionFactory = (
  connectionUrl: string,
  options: SessionOptions = {}
): DatabaseSession => {
  const config = parseConnectionUrl(connectionUrl);

  switch (config.dialect) {
    case 'postgresql':
      return new PostgresSession(config, options);
    case 'mysql':
      return new MySQLSession(config, options);
    case 'mssql':
      return new MSSQLSession(config, options);
    case 'sqlite':
      return new SqliteSession(config, options);
  }
};
