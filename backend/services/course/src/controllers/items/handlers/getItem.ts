// backend/services/course/src/controllers/items/handlers/getItem.ts
import { z } from "zod";
import { defineRoute } from "@shared/http/route";
import { param } from "@shared/http/params";
import { zItem } from "../../../contracts/misc.contract";

export const getItem = defineRoute({
  method: "GET",
  path: "/items/:item_id",
  summary: "Echo an item id",
  request: {
    path: z.object({ item_id: param.int() }),
  },
  response: zItem,
  handler: ({ values }) => ({ item_id: values.path.item_id }),
});
