export { SqliteSession } from './client.js';
