// backend/services/course/test/notifier.spec.ts
import { describe, it, expect, vi, afterEach } from "vitest";
import { logger } from "@shared/utils/logger";
import { writeNotification } from "../src/services/notifier";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("writeNotification", () => {
  it("logs the start and the delivery", async () => {
    const info = vi.spyOn(logger, "info");

    await writeNotification("ada@example.test", "Hellooo world!!", 0);

    expect(info.mock.calls).toEqual([
      [{ email: "ada@example.test" }, "sending email notification in background"],
      [{ email: "ada@example.test", message: "Hellooo world!!" }, "email sent"],
    ]);
  });

  it("waits the configured delay by default", async () => {
    const info = vi.spyOn(logger, "info");
    const started = Date.now();

    await writeNotification("bob@example.test", "hi");

    expect(Date.now() - started).toBeGreaterThanOrEqual(4);
    expect(info).toHaveBeenCalledTimes(2);
  });
});
