export * from './connection.js';
export * from './schema.js';
export * from './findings.js';
export * from './quality.js';
export * from './result.js';
