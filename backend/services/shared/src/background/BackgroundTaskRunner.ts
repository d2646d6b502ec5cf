// backend/services/shared/src/background/BackgroundTaskRunner.ts

/**
 * Runs background jobs handed off after a response.
 *
 * - Batches start on a later event-loop turn (setImmediate), never inline.
 * - Jobs in a batch run in enqueue order, each exactly once.
 * - A failing job is logged and dropped; later jobs still run. Nothing is
 *   reported to the caller, nothing is retried or persisted.
 * - `drain()` resolves when every in-flight batch has settled (shutdown, tests).
 */

import type { Logger } from "pino";
import { logger as sharedLogger } from "@shared/utils/logger";
import type { BackgroundJob } from "./BackgroundTasks";

export type DispatchMeta = {
  requestId?: string;
  path?: string;
};

export type BackgroundTaskRunnerOptions = {
  /** Defaults to the shared logger, resolved at log time. */
  logger?: Logger;
};

export class BackgroundTaskRunner {
  private readonly inflight = new Set<Promise<void>>();

  constructor(private readonly opts: BackgroundTaskRunnerOptions = {}) {}

  private get log(): Logger {
    return this.opts.logger ?? sharedLogger;
  }

  /** Number of batches handed off and not yet finished. */
  get pending(): number {
    return this.inflight.size;
  }

  dispatch(jobs: readonly BackgroundJob[], meta: DispatchMeta = {}): void {
    if (jobs.length === 0) return;

    const batch = new Promise<void>((resolve) => setImmediate(resolve)).then(
      () => this.runAll(jobs, meta)
    );
    this.inflight.add(batch);
    void batch.then(() => {
      this.inflight.delete(batch);
    });
  }

  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  private async runAll(
    jobs: readonly BackgroundJob[],
    meta: DispatchMeta
  ): Promise<void> {
    for (const job of jobs) {
      const started = Date.now();
      try {
        await job.run();
        this.log.debug(
          { ...meta, job: job.name, durationMs: Date.now() - started },
          "background job finished"
        );
      } catch (err) {
        this.log.error(
          { ...meta, job: job.name, err, durationMs: Date.now() - started },
          "background job failed"
        );
      }
    }
  }
}
