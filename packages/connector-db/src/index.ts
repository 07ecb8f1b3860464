/**
 * @schemalens/connector-db
 *
 * DatabaseSession implementations for PostgreSQL, MySQL, SQL Server and SQLite
 */

export { createSession } from './session-factory.js';
export { SqlSession } from './sql-session.js';
export { quoteIdentifier, qualifiedName, comparableExpression, countFunction } from './identifiers.js';

export { PostgresSession } from './postgresql/index.js';
export { MySQLSession } from './mysql/index.js';
export { MSSQLSession } from './mssql/index.js';
export { SqliteSession } from './sqlite/index.js';
