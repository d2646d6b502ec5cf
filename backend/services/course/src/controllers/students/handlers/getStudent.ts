// backend/services/course/src/controllers/students/handlers/getStudent.ts
import { z } from "zod";
import { defineRoute } from "@shared/http/route";
import { param } from "@shared/http/params";
import { zStudentInfo } from "../../../contracts/misc.contract";

export const getStudent = defineRoute({
  method: "GET",
  path: "/students/",
  summary: "Report the caller's cookies and user agent",
  request: {
    cookie: z.object({
      token: param.str().optional(),
      ads_id: param.str().optional(),
    }),
    header: z.object({ "user-agent": param.str().optional() }),
  },
  response: zStudentInfo,
  handler: ({ values }) => ({
    cookie_token_found: values.cookie.token ?? null,
    ads_id_in_browser: values.cookie.ads_id ?? null,
    incoming_user_agent: values.header["user-agent"] ?? null,
  }),
});
