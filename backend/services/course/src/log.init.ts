// backend/services/course/src/log.init.ts
import { initLogger } from "@shared/utils/logger";
import { SERVICE_NAME } from "./bootstrap";

/**
 * Side-effect module: tags the shared logger with { service: "course" }.
 * Import once, right after ./bootstrap.
 */
initLogger(SERVICE_NAME);
