// backend/services/course/src/contracts/cart.contract.ts
import { z } from "zod";

/** Public cart shape; anything else a handler returns is stripped. */
export const zCart = z.object({
  items: z.array(z.string()),
  totalPrice: z.number().int(),
  promotionsAttached: z.boolean(),
});
export type Cart = z.infer<typeof zCart>;
