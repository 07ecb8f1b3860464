/**
 * MCP Server Implementation
 *
 * Exposes the extraction service as MCP tools over stdio, or over
 * streamable HTTP next to the polling API.
 */

import { randomUUID } from 'node:crypto';
import { createServer as createHttpServer, type Server as HttpServer } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import {
  ExtractionError,
  Logger,
  analysisOptionsSchema,
  connectionInputSchema,
  errorMessage,
  parseConnectionConfig,
  parseExtractionRequest,
} from '@schemalens/core';
import { formatExtractionReport } from '@schemalens/pipeline';
import type { ExtractionSection, ServerSection } from './config.js';
import { ExtractionService } from './extraction-service.js';
import { HttpApi, createRequestListener } from './http-api.js';

export interface ServerConfig {
  name: string;
  version: string;
  transport?: 'stdio' | 'http';
  http?: NonNullable<ServerSection>['http'];
  extraction?: ExtractionSection;
  logger?: Logger;
}

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** Helper to create a text content item */
function textContent(text: string) {
  return { type: 'text' as const, text };
}

/** Helper to create a success result */
function success(data: unknown, options?: { isError?: boolean }): ToolResult {
  return {
    content: [textContent(JSON.stringify(data, null, 2))],
    ...(options?.isError ? { isError: true } : {}),
  };
}

/** Helper to create an error result */
function error(message: string): ToolResult {
  return { content: [textContent(message)], isError: true };
}

/** Format errors for MCP response */
function formatError(err: unknown): ToolResult {
  return error(err instanceof ExtractionError ? err.toActionableMessage() : errorMessage(err));
}

const outputFormat = z.enum(['json', 'text']).optional().describe('Result format (default: json)');

export function createMcpServer(service: ExtractionService, config: Pick<ServerConfig, 'name' | 'version' | 'logger'>) {
  const server = new McpServer({ name: config.name, version: config.version });
  const logger = config.logger ?? new Logger();

  const instrumented = async (tool: string, handler: () => Promise<ToolResult>): Promise<ToolResult> => {
    const start = Date.now();
    try {
      const result = await handler();
      const outcome = result.isError ? 'error' : 'success';
      service.metrics.incTool(tool, outcome);
      logger.info('Tool invocation completed', { tool, durationMs: Date.now() - start, outcome });
      return result;
    } catch (err) {
      service.metrics.incTool(tool, 'error');
      logger.error('Tool invocation failed', { tool, durationMs: Date.now() - start, error: errorMessage(err) });
      return formatError(err);
    }
  };

  // Tool: test_connection
  server.registerTool(
    'test_connection',
    {
      description:
        'Check that a database is reachable with the given credentials. Opens a connection, runs SELECT 1 and closes it.',
      inputSchema: { connection: connectionInputSchema },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      instrumented('test_connection', async () => {
        const result = await service.testConnection(parseConnectionConfig(args.connection));
        return success(result, { isError: result.status === 'error' });
      })
  );

  // Tool: start_extraction
  server.registerTool(
    'start_extraction',
    {
      description:
        'Start a metadata extraction run: connection test, schema introspection, sensitive-column detection and optional data-quality profiling. Returns a run id to poll with get_extraction.',
      inputSchema: {
        connection: connectionInputSchema,
        options: analysisOptionsSchema.optional(),
        wait: z.boolean().optional().describe('Wait for the run to finish and return the result'),
        format: outputFormat,
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      instrumented('start_extraction', async () => {
        const request = parseExtractionRequest({ connection: args.connection, options: args.options });
        const runId = service.start(request);
        if (!args.wait) {
          return success({ runId, status: 'running' });
        }

        const result = await service.wait(runId);
        if (!result) return error(`Run ${runId} is no longer available`);
        const isError = result.status === 'failed';
        return args.format === 'text'
          ? { content: [textContent(formatExtractionReport(result))], ...(isError ? { isError } : {}) }
          : success(result, { isError });
      })
  );

  // Tool: get_extraction
  server.registerTool(
    'get_extraction',
    {
      description: 'Get the latest snapshot of an extraction run. Status is running, completed or failed.',
      inputSchema: {
        run_id: z.string().min(1).describe('Run id returned by start_extraction'),
        format: outputFormat,
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      instrumented('get_extraction', async () => {
        const snapshot = service.get(args.run_id);
        if (!snapshot) return error(`Unknown run: ${args.run_id}`);
        return args.format === 'text'
          ? { content: [textContent(formatExtractionReport(snapshot))] }
          : success(snapshot);
      })
  );

  // Tool: cancel_extraction
  server.registerTool(
    'cancel_extraction',
    {
      description: 'Cancel a running extraction. The run stops before its next stage and ends as failed (CANCELLED).',
      inputSchema: {
        run_id: z.string().min(1).describe('Run id returned by start_extraction'),
      },
    },
    async (args) =>
      instrumented('cancel_extraction', async () => {
        const outcome = service.cancel(args.run_id);
        switch (outcome) {
          case 'cancelled':
            return success({ runId: args.run_id, cancelled: true });
          case 'finished':
            return error(`Run ${args.run_id} has already finished`);
          case 'unknown':
            return error(`Unknown run: ${args.run_id}`);
        }
      })
  );

  return server;
}

/**
 * Run the MCP server (stdio) or the MCP endpoint plus polling API (http)
 */
export async function runServer(config: ServerConfig): Promise<void> {
  const logger = config.logger ?? new Logger();
  const service = new ExtractionService({ extraction: config.extraction, logger });
  const server = createMcpServer(service, { ...config, logger });

  const mode = config.transport ?? 'stdio';

  const shutdown = async (signal: string, httpServer?: HttpServer) => {
    try {
      if (httpServer) {
        await new Promise<void>((resolve) => httpServer.close(() => resolve()));
      }
      await service.shutdown();
      await server.close();
      logger.info('Shutdown complete', { signal });
    } finally {
      process.exit(0);
    }
  };

  const onSignal = (signal: string, httpServer?: HttpServer) => () => {
    shutdown(signal, httpServer).catch((err: unknown) => {
      logger.error('Shutdown failed', { signal, error: errorMessage(err) });
    });
  };

  if (mode === 'http') {
    const host = config.http?.host ?? '127.0.0.1';
    const port = config.http?.port ?? 3333;
    const mcpPath = config.http?.path ?? '/mcp';

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
    });
    await server.connect(transport);

    const api = new HttpApi(service, {
      healthPath: config.http?.healthPath,
      metricsPath: config.http?.metricsPath,
      maxRequestBytes: config.http?.maxRequestBytes,
      logger,
    });
    const httpServer = createHttpServer(
      createRequestListener(api, logger, {
        path: mcpPath,
        handle: (req, res) => transport.handleRequest(req, res),
      })
    );

    process.on('SIGINT', onSignal('SIGINT', httpServer));
    process.on('SIGTERM', onSignal('SIGTERM', httpServer));

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, host, () => resolve());
    });

    logger.info('Server started', {
      name: config.name,
      version: config.version,
      transport: 'http',
      mcp: `http://${host}:${port}${mcpPath}`,
      api: `http://${host}:${port}/extractions`,
    });
    return;
  }

  const transport = new StdioServerTransport();

  process.on('SIGINT', onSignal('SIGINT'));
  process.on('SIGTERM', onSignal('SIGTERM'));

  await server.connect(transport);

  logger.info('Server started', { name: config.name, version: config.version, transport: 'stdio' });
}
