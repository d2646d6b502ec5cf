// backend/services/course/src/services/notifier.ts
import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "@shared/utils/logger";
import { config } from "../config";

/**
 * Pretend to send an email. Runs as a background job: the delay stands in
 * for a slow mail relay and never sits on the response path.
 */
export async function writeNotification(
  email: string,
  message: string,
  delayMs: number = config.notifyDelayMs
): Promise<void> {
  logger.info({ email }, "sending email notification in background");
  await sleep(delayMs);
  logger.info({ email, message }, "email sent");
}
