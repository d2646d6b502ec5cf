// backend/services/shared/src/background/BackgroundTasks.ts

/** A unit of deferred work: the callable plus the arguments captured at enqueue. */
export type BackgroundJob = {
  readonly name: string;
  run(): unknown;
};

/**
 * Per-request queue of jobs to run once the response has been handed off.
 * `take()` seals the queue, so a job can be handed to the runner only once.
 */
export class BackgroundTasks {
  private jobs: BackgroundJob[] = [];
  private sealed = false;

  add<A extends unknown[]>(fn: (...args: A) => unknown, ...args: A): void {
    if (this.sealed) {
      throw new Error(
        `background task "${fn.name || "anonymous"}" added after the response was handed off`
      );
    }
    this.jobs.push({ name: fn.name || "anonymous", run: () => fn(...args) });
  }

  get size(): number {
    return this.jobs.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  take(): BackgroundJob[] {
    this.sealed = true;
    const out = this.jobs;
    this.jobs = [];
    return out;
  }
}
