// backend/services/course/src/controllers/courses/handlers/createCourse.ts
import { defineRoute } from "@shared/http/route";
import { zCourseEntity } from "../../../contracts/course.contract";

/** Validates and echoes the entity; nothing is stored. */
export const createCourse = defineRoute({
  method: "POST",
  path: "/courses/",
  summary: "Create a course",
  request: { body: zCourseEntity },
  response: zCourseEntity,
  handler: ({ values, log }) => {
    const course = values.body;
    log.info({ courseId: course.id, name: course.name }, "course created");
    return course;
  },
});
