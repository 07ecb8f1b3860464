/**
 * @schemalens/server
 *
 * Extraction service exposed as MCP tools, an HTTP polling API and a CLI.
 */

export { createMcpServer, runServer } from './server.js';
export type { ServerConfig } from './server.js';
export { ExtractionService, orchestratorOptionsFromConfig } from './extraction-service.js';
export type { CancelOutcome, ExtractionServiceOptions } from './extraction-service.js';
export { HttpApi, createRequestListener, DEFAULT_MAX_REQUEST_BYTES } from './http-api.js';
export type { ApiRequest, ApiResponse, HttpApiOptions, McpHttpEndpoint } from './http-api.js';
export { RunStore, DEFAULT_MAX_STORED_RUNS } from './run-store.js';
export { Metrics } from './metrics.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  loadConfig,
  parseConfig,
  parseJsonDocument,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions, ExtractionSection, ServerSection, TransportMode } from './config.js';
export {
  USAGE,
  UsageError,
  loadRequestFile,
  parseCliArgs,
  runExtractCommand,
  runServeCommand,
} from './commands.js';
export type { CliCommand, ExtractCommandIo, OutputFormat, OutputStream } from './commands.js';
