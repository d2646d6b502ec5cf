// backend/services/course/src/controllers/notifications/handlers/sendEmail.ts
import { z } from "zod";
import { defineRoute } from "@shared/http/route";
import { param } from "@shared/http/params";
import { writeNotification } from "../../../services/notifier";

export const NOTIFICATION_MESSAGE = "Hellooo world!!";

/** Answers immediately; the notification runs after the response is sent. */
export const sendEmail = defineRoute({
  method: "GET",
  path: "/send_email/:email",
  summary: "Queue an email notification",
  request: {
    path: z.object({ email: param.str() }),
  },
  handler: ({ values, tasks, log }) => {
    tasks.add(writeNotification, values.path.email, NOTIFICATION_MESSAGE);
    log.debug({ email: values.path.email }, "notification queued");
    return null;
  },
});
