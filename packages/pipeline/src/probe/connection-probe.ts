/**
 * ConnectionProbe
 *
 * Opens a short-lived session, runs `SELECT 1`, and closes the session on
 * every exit path. Connection problems come back as a `status: 'error'`
 * result; only faults that are not ExtractionErrors escape.
 */

import {
  DIALECT_LABELS,
  ExtractionError,
  errorMessage,
  silentLogger,
  withTimeout,
  type ConnectionTestResult,
  type DatabaseSession,
  type Logger,
  type SessionFactory,
} from '@schemalens/core';

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

/** Upper bound on waiting for a session to close after the probe */
const CLOSE_TIMEOUT_MS = 5_000;

export interface ConnectionProbeOptions {
  connectTimeoutMs?: number;
  logger?: Logger;
}

export class ConnectionProbe {
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly sessionFactory: SessionFactory,
    options: ConnectionProbeOptions = {}
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async probe(connectionUrl: string, connectTimeoutMs = this.connectTimeoutMs): Promise<ConnectionTestResult> {
    const started = Date.now();
    let session: DatabaseSession | undefined;

    try {
      session = this.sessionFactory(connectionUrl, {
        connectTimeoutMs,
        queryTimeoutMs: connectTimeoutMs,
        maxConnections: 1,
      });
      const opened = session;

      await withTimeout(
        (async () => {
          await opened.connect();
          await opened.ping();
        })(),
        connectTimeoutMs,
        () =>
          new ExtractionError({
            code: 'CONNECTION_FAILED',
            message: `Connection attempt timed out after ${connectTimeoutMs}ms`,
            suggestion: 'Check that the host is reachable from this machine and the port is open.',
          })
      );

      const latencyMs = Date.now() - started;
      this.logger.debug('Connection probe succeeded', { dialect: opened.dialect, latencyMs });
      return {
        status: 'success',
        message: `Connected to ${DIALECT_LABELS[opened.dialect]} successfully`,
        timestamp: new Date().toISOString(),
        latencyMs,
      };
    } catch (error) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }
      this.logger.warn('Connection probe failed', { code: error.code, error: error.message });
      return {
        status: 'error',
        message: error.message,
        timestamp: new Date().toISOString(),
        code: error.code,
      };
    } finally {
      if (session) {
        await this.release(session);
      }
    }
  }

  private async release(session: DatabaseSession): Promise<void> {
    try {
      await withTimeout(session.close(), CLOSE_TIMEOUT_MS);
    } catch (error) {
      this.logger.warn('Failed to close probe session', { error: errorMessage(error) });
    }
  }
}
