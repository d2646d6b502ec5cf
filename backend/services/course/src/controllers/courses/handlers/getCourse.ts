// backend/services/course/src/controllers/courses/handlers/getCourse.ts
import { z } from "zod";
import { defineRoute } from "@shared/http/route";
import { param, withDefault } from "@shared/http/params";
import {
  COURSES,
  zCourseInfo,
  type Course,
} from "../../../contracts/course.contract";

export function describeCourse(course: Course): string {
  switch (course) {
    case "chemistry":
      return "Let's learn about chemicals!";
    case "physics":
      return "Let's learn about physical matters!";
    case "math":
      return "Let's learn about numbers!";
    default: {
      const unreachable: never = course;
      throw new Error(`Unknown course: ${String(unreachable)}`);
    }
  }
}

export const getCourse = defineRoute({
  method: "GET",
  path: "/courses/:course",
  summary: "Describe a course",
  request: {
    path: z.object({ course: param.enumOf(COURSES) }),
    query: z.object({
      language: param.str(),
      minRating: withDefault(param.int(), 0),
    }),
  },
  response: zCourseInfo,
  handler: ({ values, log }) => {
    const { course } = values.path;
    log.debug({ course }, "getCourse enter");
    return {
      description: describeCourse(course),
      language: values.query.language,
      minRating: values.query.minRating,
    };
  },
});
