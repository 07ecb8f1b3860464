export { MSSQLSession } from './client.js';
