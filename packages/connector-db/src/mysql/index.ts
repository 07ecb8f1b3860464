export { MySQLSession } from './client.js';
