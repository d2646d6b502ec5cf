// backend/services/course/src/routes/index.ts
import { RouteTable } from "@shared/http/RouteTable";
import { courseRoutes } from "./courseRoutes";
import { itemRoutes } from "./itemRoutes";
import { notificationRoutes } from "./notificationRoutes";
import { shopRoutes } from "./shopRoutes";

/** Fresh table per app; registration rejects duplicates at start-up. */
export function buildRouteTable(): RouteTable {
  return new RouteTable([
    ...itemRoutes,
    ...courseRoutes,
    ...shopRoutes,
    ...notificationRoutes,
  ]);
}
