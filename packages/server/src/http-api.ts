/**
 * HTTP polling API
 *
 *   POST   /extractions        start a run            → 202 { runId }
 *   GET    /extractions/:id    latest snapshot        → 200 | 404
 *   DELETE /extractions/:id    cancel between stages  → 202 | 404 | 409
 *   POST   /connections/test   one-off probe          → 200 ConnectionTestResult
 *   GET    /healthz, /metrics
 *
 * HttpApi is a pure request → response mapping; createRequestListener
 * adapts it to node:http.
 */

import type { IncomingMessage, RequestListener, ServerResponse } from 'node:http';
import { z } from 'zod';
import {
  ExtractionError,
  errorMessage,
  formatZodIssues,
  parseConnectionConfig,
  parseExtractionRequest,
  silentLogger,
  type Logger,
} from '@schemalens/core';
import type { ExtractionService } from './extraction-service.js';

export const DEFAULT_MAX_REQUEST_BYTES = 1_000_000;

const JSON_TYPE = 'application/json; charset=utf-8';
const TEXT_TYPE = 'text/plain; charset=utf-8';
const PROMETHEUS_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

const RUN_PATH = /^\/extractions\/([^/]+)$/;

const testConnectionBodySchema = z.object({ connection: z.unknown() }).strict();

export interface ApiRequest {
  method: string;
  path: string;
  /** null when the body was not read (over the size limit) */
  body: string | null;
  bodyBytes: number;
}

export interface ApiResponse {
  status: number;
  contentType: string;
  body: string;
}

export interface HttpApiOptions {
  healthPath?: string;
  metricsPath?: string;
  maxRequestBytes?: number;
  logger?: Logger;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function json(status: number, payload: unknown): ApiResponse {
  return { status, contentType: JSON_TYPE, body: JSON.stringify(payload, null, 2) };
}

function apiError(status: number, code: string, message: string): ApiResponse {
  return json(status, { error: { code, message } });
}

function text(status: number, body: string): ApiResponse {
  return { status, contentType: TEXT_TYPE, body };
}

function routeLabel(path: string): string {
  return RUN_PATH.test(path) ? '/extractions/:id' : path;
}

export class HttpApi {
  readonly maxRequestBytes: number;
  private readonly healthPath: string;
  private readonly metricsPath: string;
  private readonly logger: Logger;

  constructor(
    private readonly service: ExtractionService,
    options: HttpApiOptions = {}
  ) {
    this.healthPath = options.healthPath ?? '/healthz';
    this.metricsPath = options.metricsPath ?? '/metrics';
    this.maxRequestBytes = options.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES;
    this.logger = options.logger ?? silentLogger;
  }

  async handle(request: ApiRequest): Promise<ApiResponse> {
    const response = await this.route(request);
    this.service.metrics.incHttp(routeLabel(request.path), response.status);
    return response;
  }

  private async route(request: ApiRequest): Promise<ApiResponse> {
    const { method, path } = request;

    if (path === this.healthPath) {
      return method === 'GET' ? text(200, 'ok') : this.methodNotAllowed(method, path);
    }
    if (path === this.metricsPath) {
      return method === 'GET'
        ? { status: 200, contentType: PROMETHEUS_TYPE, body: this.service.metrics.render() }
        : this.methodNotAllowed(method, path);
    }

    if (request.bodyBytes > this.maxRequestBytes) {
      return apiError(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds ${this.maxRequestBytes} bytes`);
    }

    try {
      if (path === '/extractions') {
        if (method !== 'POST') return this.methodNotAllowed(method, path);
        const extraction = parseExtractionRequest(this.parseBody(request));
        const runId = this.service.start(extraction);
        return json(202, { runId, status: 'running' });
      }

      if (path === '/connections/test') {
        if (method !== 'POST') return this.methodNotAllowed(method, path);
        const parsed = testConnectionBodySchema.safeParse(this.parseBody(request));
        if (!parsed.success) {
          throw new ExtractionError({
            code: 'INVALID_CONFIG',
            message: formatZodIssues('Invalid connection test request', parsed.error),
          });
        }
        const connection = parseConnectionConfig(parsed.data.connection);
        return json(200, await this.service.testConnection(connection));
      }

      const runId = RUN_PATH.exec(path)?.[1];
      if (runId !== undefined) {
        return this.routeRun(method, runId);
      }

      return apiError(404, 'NOT_FOUND', `No route for ${method} ${path}`);
    } catch (error) {
      return this.errorResponse(error);
    }
  }

  private routeRun(method: string, runId: string): ApiResponse {
    if (method === 'GET') {
      const snapshot = this.service.get(runId);
      return snapshot ? json(200, snapshot) : apiError(404, 'NOT_FOUND', `Unknown run: ${runId}`);
    }

    if (method === 'DELETE') {
      switch (this.service.cancel(runId)) {
        case 'cancelled':
          return json(202, { runId, cancelled: true });
        case 'finished':
          return apiError(409, 'RUN_FINISHED', `Run ${runId} has already finished`);
        case 'unknown':
          return apiError(404, 'NOT_FOUND', `Unknown run: ${runId}`);
      }
    }

    return this.methodNotAllowed(method, '/extractions/:id');
  }

  private parseBody(request: ApiRequest): unknown {
    if (request.body === null || request.body.trim() === '') {
      throw new HttpError(400, 'INVALID_JSON', 'Request body is required');
    }
    try {
      return JSON.parse(request.body);
    } catch {
      throw new HttpError(400, 'INVALID_JSON', 'Request body is not valid JSON');
    }
  }

  private methodNotAllowed(method: string, path: string): ApiResponse {
    return apiError(405, 'METHOD_NOT_ALLOWED', `${method} is not allowed on ${path}`);
  }

  private errorResponse(error: unknown): ApiResponse {
    if (error instanceof HttpError) {
      return apiError(error.status, error.code, error.message);
    }
    if (error instanceof ExtractionError && (error.code === 'INVALID_CONFIG' || error.code === 'UNSUPPORTED_DIALECT')) {
      return apiError(400, error.code, error.message);
    }
    this.logger.error('HTTP API request failed', { error: errorMessage(error) });
    return apiError(500, 'INTERNAL', 'Internal server error');
  }
}

/**
 * Read a request body, keeping at most `maxBytes` of it
 */
function readBody(req: IncomingMessage, maxBytes: number): Promise<{ body: string | null; bytes: number }> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let bytes = 0;
    req.on('data', (chunk: Buffer) => {
      bytes += chunk.length;
      if (bytes <= maxBytes) chunks.push(chunk);
    });
    req.on('end', () => {
      resolve({ body: bytes > maxBytes ? null : Buffer.concat(chunks).toString('utf-8'), bytes });
    });
    req.on('error', reject);
  });
}

/** Requests on this path go to the MCP transport instead of HttpApi */
export interface McpHttpEndpoint {
  path: string;
  handle(req: IncomingMessage, res: ServerResponse): Promise<void>;
}

export function createRequestListener(api: HttpApi, logger: Logger, mcp?: McpHttpEndpoint): RequestListener {
  const serve = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (mcp && url.pathname === mcp.path) {
      await mcp.handle(req, res);
      return;
    }

    // Reject on the declared length before reading anything
    const declared = Number(req.headers['content-length'] ?? '0');
    const { body, bytes } =
      Number.isFinite(declared) && declared > api.maxRequestBytes
        ? { body: null, bytes: declared }
        : await readBody(req, api.maxRequestBytes);

    const response = await api.handle({ method: req.method ?? 'GET', path: url.pathname, body, bodyBytes: bytes });
    res.writeHead(response.status, {
      'Content-Type': response.contentType,
      'X-Content-Type-Options': 'nosniff',
    });
    res.end(response.body);
  };

  return (req, res) => {
    serve(req, res).catch((error: unknown) => {
      logger.error('HTTP request failed', { error: errorMessage(error) });
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.writeHead(500, { 'Content-Type': TEXT_TYPE });
      res.end('Internal server error');
    });
  };
}
