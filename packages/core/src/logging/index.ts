export { Logger, redactSecrets, silentLogger, createRunId } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
