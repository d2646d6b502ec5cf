// backend/services/course/src/contracts/course.contract.ts
import { z } from "zod";

/** Closed set of courses; matched by exact literal value. */
export const COURSES = ["chemistry", "physics", "math"] as const;
export const zCourse = z.enum(COURSES);
export type Course = z.infer<typeof zCourse>;

/**
 * Course entity accepted by POST /courses/.
 * Unknown fields are dropped; `language` and `tags` fall back to defaults.
 */
export const zCourseEntity = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().min(5),
  language: z.string().nullable().default(null),
  rating: z.number().int(),
  tags: z.array(z.string()).default(() => ["public"]),
});

export const zCourseInfo = z.object({
  description: z.string(),
  language: z.string(),
  minRating: z.number().int(),
});
