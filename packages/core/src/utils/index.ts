export {
  SQLITE_URL_PREFIX,
  buildConnectionUrl,
  parseConnectionUrl,
  validateConnectionConfig,
} from './connection-url.js';
export type { ServerConnection, SqliteConnection, ValidatedConnection } from './connection-url.js';
export { withTimeout, throwIfCancelled } from './timeout.js';
export { withRetries, backoffDelayMs, sleep } from './retry.js';
export type { RetryConfig, RetryAttempt } from './retry.js';
export { Semaphore } from './semaphore.js';
export { readString, readNullableString, readBoolean, readCount } from './rows.js';
