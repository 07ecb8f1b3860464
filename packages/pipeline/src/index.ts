/**
 * @schemalens/pipeline
 *
 * Extraction stages and the orchestrator that runs them.
 */

// Interfaces
export type {
  ProgressCallback,
  StageEvent,
  StageExecutor,
  StageObserver,
  StagePolicy,
  StageTask,
} from './interfaces/index.js';

// Stages
export { ConnectionProbe, DEFAULT_CONNECT_TIMEOUT_MS } from './probe/connection-probe.js';
export type { ConnectionProbeOptions } from './probe/connection-probe.js';
export { SchemaIntrospector } from './introspection/schema-introspector.js';
export type { IntrospectionOptions } from './introspection/schema-introspector.js';
export * from './classification/index.js';
export * from './quality/index.js';

// Orchestration
export * from './orchestrator/index.js';

// Formatters
export { formatExtractionReport, MAX_LISTED_FINDINGS } from './formatters/report-formatter.js';
