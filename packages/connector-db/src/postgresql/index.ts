export { PostgresSession } from './client.js';
