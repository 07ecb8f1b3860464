export type {
  Row,
  QueryResult,
  CatalogReader,
  DatabaseSession,
  SessionOptions,
  SessionFactory,
} from './session.js';
