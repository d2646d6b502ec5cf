// backend/services/shared/test/background.spec.ts
import pino from "pino";
import { describe, it, expect } from "vitest";
import { BackgroundTasks } from "@shared/background/BackgroundTasks";
import { BackgroundTaskRunner } from "@shared/background/BackgroundTaskRunner";

function captureLogger(lines: string[]) {
  return pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
}

describe("BackgroundTasks", () => {
  it("captures arguments at enqueue time", async () => {
    const seen: string[] = [];
    const tasks = new BackgroundTasks();
    const record = (a: string, b: number) => {
      seen.push(`${a}:${b}`);
    };
    tasks.add(record, "x", 1);
    expect(tasks.size).toBe(1);

    const [job] = tasks.take();
    expect(job?.name).toBe("record");
    await job?.run();
    expect(seen).toEqual(["x:1"]);
  });

  it("seals on take", () => {
    const tasks = new BackgroundTasks();
    tasks.add(function first() {});
    expect(tasks.take()).toHaveLength(1);
    expect(tasks.isSealed).toBe(true);
    expect(tasks.size).toBe(0);
    expect(() => tasks.add(function late() {})).toThrow(
      'background task "late" added after the response was handed off'
    );
  });
});

describe("BackgroundTaskRunner", () => {
  it("starts nothing inline and runs jobs in enqueue order", async () => {
    const order: string[] = [];
    const tasks = new BackgroundTasks();
    tasks.add((n: string) => {
      order.push(n);
    }, "a");
    tasks.add(async (n: string) => {
      await Promise.resolve();
      order.push(n);
    }, "b");

    const runner = new BackgroundTaskRunner({ logger: pino({ level: "silent" }) });
    runner.dispatch(tasks.take());

    expect(order).toEqual([]);
    expect(runner.pending).toBe(1);

    await runner.drain();
    expect(order).toEqual(["a", "b"]);
    expect(runner.pending).toBe(0);
  });

  it("logs a failure and keeps going", async () => {
    const lines: string[] = [];
    const ran: string[] = [];
    const tasks = new BackgroundTasks();
    tasks.add(function explode() {
      throw new Error("kaboom");
    });
    tasks.add(function after() {
      ran.push("after");
    });

    const runner = new BackgroundTaskRunner({ logger: captureLogger(lines) });
    runner.dispatch(tasks.take(), { requestId: "req-9", path: "/x" });
    await runner.drain();

    expect(ran).toEqual(["after"]);
    const entries = lines.map((l) => JSON.parse(l));
    const failed = entries.find((e) => e.msg === "background job failed");
    expect(failed).toMatchObject({
      level: 50,
      job: "explode",
      requestId: "req-9",
      path: "/x",
      err: { message: "kaboom" },
    });
    const finished = entries.filter((e) => e.msg === "background job finished");
    expect(finished.map((e) => e.job)).toEqual(["after"]);
  });

  it("ignores empty batches", async () => {
    const runner = new BackgroundTaskRunner();
    runner.dispatch([]);
    expect(runner.pending).toBe(0);
    await runner.drain();
  });
});
