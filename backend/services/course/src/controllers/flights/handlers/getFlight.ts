// backend/services/course/src/controllers/flights/handlers/getFlight.ts
import { z } from "zod";
import { defineRoute } from "@shared/http/route";
import { HttpError } from "@shared/http/errors";
import { param } from "@shared/http/params";
import { zFlightMessage } from "../../../contracts/misc.contract";

const KNOWN_FLIGHTS: ReadonlySet<number> = new Set([1, 2, 3]);

export const getFlight = defineRoute({
  method: "GET",
  path: "/flights/:flight_id",
  summary: "Look up a flight",
  request: {
    path: z.object({ flight_id: param.int() }),
  },
  response: zFlightMessage,
  handler: ({ values }) => {
    if (!KNOWN_FLIGHTS.has(values.path.flight_id)) {
      throw new HttpError(404, "Flight not found");
    }
    return { message: "Fly high!" };
  },
});
