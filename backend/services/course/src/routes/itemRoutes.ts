// backend/services/course/src/routes/itemRoutes.ts
import type { Route } from "@shared/http/route";
import { getItem } from "../controllers/items/handlers/getItem";

// one-liners only; no logic here
export const itemRoutes: readonly Route[] = [getItem];
