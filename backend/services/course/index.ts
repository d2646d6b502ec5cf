// backend/services/course/index.ts

/**
 * Keep start-up boring: load env (bootstrap), init logs, then start HTTP with
 * the shared startHttpService. Shutdown waits for queued background jobs.
 */

import "./src/bootstrap";
import "./src/log.init";

import app, { runner } from "./src/app";
import { config } from "./src/config";
import { SERVICE_NAME } from "./src/bootstrap";
import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

function start(): void {
  try {
    startHttpService({
      app,
      host: config.host,
      port: config.port,
      serviceName: SERVICE_NAME,
      logger,
      beforeExit: async () => {
        logger.info({ pending: runner.pending }, "draining background jobs");
        await runner.drain();
      },
    });
  } catch (err) {
    logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
    process.exit(1);
  }
}

start();
