// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Starting/stopping an HTTP server is a single concern: bind, harden socket
 * timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 * Higher-level bootstraps (env load, logger init, app assembly) call this.
 *
 * Notes:
 * - `process.once` for SIGINT/SIGTERM so repeated calls don't stack handlers.
 * - `beforeExit` runs after the server has closed (e.g. drain background jobs).
 * - headersTimeout stays above keepAliveTimeout.
 */

import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Express } from "express";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  host: string;
  /** 0 binds an ephemeral port. */
  port: number;
  serviceName: string;
  logger: Logger;
  /** Runs after the server stops accepting connections, before exit. */
  beforeExit?: () => Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export function startHttpService(opts: StartHttpServiceOptions): Server {
  const { app, host, port, serviceName, logger } = opts;

  const server = app.listen(port, host, () => {
    const addr: AddressInfo | string | null = server.address();
    const boundPort = addr && typeof addr === "object" ? addr.port : port;
    logger.info({ service: serviceName, host, port: boundPort }, "service listening");
  });

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    // Fail-safe in case close or the drain hangs
    setTimeout(() => process.exit(1), SHUTDOWN_TIMEOUT_MS).unref();
    void stop()
      .then(() => opts.beforeExit?.())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err, service: serviceName }, "shutdown failed");
          process.exit(1);
        }
      );
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return server;
}
