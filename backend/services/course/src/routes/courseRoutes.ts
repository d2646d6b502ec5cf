// backend/services/course/src/routes/courseRoutes.ts
import type { Route } from "@shared/http/route";
import { getCourse } from "../controllers/courses/handlers/getCourse";
import { createCourse } from "../controllers/courses/handlers/createCourse";
import { getStudent } from "../controllers/students/handlers/getStudent";

export const courseRoutes: readonly Route[] = [getCourse, createCourse, getStudent];
