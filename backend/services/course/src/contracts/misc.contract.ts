// backend/services/course/src/contracts/misc.contract.ts
import { z } from "zod";

export const zItem = z.object({ item_id: z.number().int() });

export const zStudentInfo = z.object({
  cookie_token_found: z.string().nullable(),
  ads_id_in_browser: z.string().nullable(),
  incoming_user_agent: z.string().nullable(),
});

export const zFlightMessage = z.object({ message: z.string() });
