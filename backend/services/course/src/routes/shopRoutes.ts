// backend/services/course/src/routes/shopRoutes.ts
import type { Route } from "@shared/http/route";
import { getCart } from "../controllers/cart/handlers/getCart";
import { getFlight } from "../controllers/flights/handlers/getFlight";

export const shopRoutes: readonly Route[] = [getCart, getFlight];
