/**
 * Connection and analysis request types
 */

/** Dialect identifiers accepted on the wire (case-sensitive, exact match) */
export const DIALECTS = ['postgresql', 'mysql', 'sqlite', 'mssql'] as const;

export type Dialect = (typeof DIALECTS)[number];

/** Dialects reached over the network (everything except sqlite) */
export type ServerDialect = Exclude<Dialect, 'sqlite'>;

/** Display names used in messages and reports */
export const DIALECT_LABELS: Record<Dialect, string> = {
  postgresql: 'PostgreSQL',
  mysql: 'MySQL',
  sqlite: 'SQLite',
  mssql: 'SQL Server',
};

export const SERVER_DEFAULT_PORTS: Record<ServerDialect, number> = {
  postgresql: 5432,
  mysql: 3306,
  mssql: 1433,
};

/** Placeholder ports for display; a config without a port falls back to these */
export const DEFAULT_PORTS: Record<Dialect, number | null> = {
  ...SERVER_DEFAULT_PORTS,
  sqlite: null,
};

export function isDialect(value: string): value is Dialect {
  return DIALECTS.some((dialect) => dialect === value);
}

export interface ConnectionConfig {
  dialect: Dialect;
  /** Required for server dialects, absent for sqlite */
  host?: string;
  port?: number;
  /** Database name, or the database file path for sqlite */
  database: string;
  username?: string;
  password?: string;
  /** SQL Server only: accept a certificate that does not chain to a trusted root */
  trustServerCertificate?: boolean;
}

/**
 * Connection details as received from a caller, before the dialect
 * and required fields have been checked.
 */
export interface ConnectionInput {
  dialect: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  /** SQL Server only: accept a certificate that does not chain to a trusted root */
  trustServerCertificate?: boolean;
}

export interface AnalysisOptions {
  /** Stop after the connectivity check */
  testOnly: boolean;
  analyzeDataQuality: boolean;
  detectSensitiveData: boolean;
  /** Upper bound on tables profiled by the quality stage */
  maxTablesForQualityAnalysis: number;
  /** Restrict introspection to these schemas */
  schemas?: string[];
}

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  testOnly: false,
  analyzeDataQuality: false,
  detectSensitiveData: true,
  maxTablesForQualityAnalysis: 5,
};

export interface ExtractionRequest {
  connection: ConnectionConfig;
  options: AnalysisOptions;
}
