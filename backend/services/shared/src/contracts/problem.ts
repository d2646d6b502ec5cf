// backend/services/shared/src/contracts/problem.ts
import { z } from "zod";

export const zFieldError = z.object({
  in: z.enum(["path", "query", "header", "cookie", "body"]),
  path: z.string(),
  code: z.string(),
  message: z.string(),
});

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z.array(zFieldError).optional(),
});
export type Problem = z.infer<typeof zProblem>;

/** Strip undefined (stable wire format) */
export function clean(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}
