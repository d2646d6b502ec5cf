// backend/services/shared/src/middleware/backgroundTasks.ts
import type { Request, Response, NextFunction } from "express";
import { BackgroundTasks } from "@shared/background/BackgroundTasks";
import type { BackgroundTaskRunner } from "@shared/background/BackgroundTaskRunner";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      backgroundTasks?: BackgroundTasks;
    }
  }
}

/**
 * Gives each request a BackgroundTasks queue and hands it to the runner once
 * the response is finished. If the client goes away first (`close` without
 * `finish`), queued jobs are still handed off: they don't depend on the client.
 * An error response (status >= 400) drops the queue; the handler that queued
 * the jobs did not complete.
 */
export function backgroundTasks(runner: BackgroundTaskRunner) {
  return (req: Request, res: Response, next: NextFunction) => {
    const tasks = new BackgroundTasks();
    req.backgroundTasks = tasks;

    let handedOff = false;
    const handOff = () => {
      if (handedOff) return;
      handedOff = true;
      const jobs = tasks.take();
      if (res.statusCode >= 400) {
        if (jobs.length > 0) {
          req.log?.debug(
            { status: res.statusCode, dropped: jobs.length },
            "background jobs dropped"
          );
        }
        return;
      }
      runner.dispatch(jobs, {
        requestId: req.id ? String(req.id) : undefined,
        path: req.originalUrl,
      });
    };

    res.once("finish", handOff);
    res.once("close", handOff);
    next();
  };
}
