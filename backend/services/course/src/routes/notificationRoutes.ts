// backend/services/course/src/routes/notificationRoutes.ts
import type { Route } from "@shared/http/route";
import { sendEmail } from "../controllers/notifications/handlers/sendEmail";

export const notificationRoutes: readonly Route[] = [sendEmail];
