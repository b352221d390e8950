// src/routes/courses.ts
import { Router, Request, Response } from "express";
import type { AppContext } from "../lib/appContext";
import { validateBody } from "../middleware/validate";
import { createCourseSchema, updateCourseSchema } from "../joi/records.joi";
import { sendResult } from "../helpers/http.helper";
import {
  addCourse,
  CourseDraft,
  CourseUpdate,
  deleteCourse,
  getCourse,
  listCourses,
  searchCourses,
  updateCourse,
} from "../services/courseService";

export default function coursesRouter({ config, store }: AppContext) {
  const router = Router();

  router.get("/", (req: Request, res: Response) => {
    res.json(listCourses(store));
  });

  // SEARCH by code or title
  router.get("/search", (req: Request, res: Response) => {
    const { q } = req.query;
    if (typeof q !== "string" || !q.trim()) {
      return res.status(400).json({ success: false, message: "Query parameter q is required" });
    }
    res.json(searchCourses(store, q));
  });

  router.get("/:code", (req: Request, res: Response) => {
    sendResult(res, getCourse(store, req.params.code));
  });

  router.post("/", validateBody(createCourseSchema), (req: Request, res: Response) => {
    const draft: CourseDraft = req.body;
    sendResult(res, addCourse(store, draft), 201);
  });

  router.put("/:code", validateBody(updateCourseSchema), (req: Request, res: Response) => {
    const update: CourseUpdate = req.body;
    sendResult(res, updateCourse(store, config, req.params.code, update));
  });

  router.delete("/:code", (req: Request, res: Response) => {
    sendResult(res, deleteCourse(store, req.params.code));
  });

  return router;
}
