// src/routes/enrollments.ts
import { Router, Request, Response } from "express";
import type { AppContext } from "../lib/appContext";
import { validateBody } from "../middleware/validate";
import { enrollSchema, gradeSchema } from "../joi/records.joi";
import { sendResult } from "../helpers/http.helper";
import { enroll, recordGrade, unenroll } from "../services/enrollmentEngine";

export default function enrollmentsRouter({ store, config }: AppContext) {
  const router = Router();

  router.post("/", validateBody(enrollSchema), (req: Request, res: Response) => {
    const { studentId, courseCode }: { studentId: string; courseCode: string } = req.body;
    sendResult(res, enroll(store, config, studentId, courseCode), 201);
  });

  router.delete("/:studentId/:courseCode", (req: Request, res: Response) => {
    sendResult(res, unenroll(store, req.params.studentId, req.params.courseCode));
  });

  router.put("/:studentId/:courseCode/grade", validateBody(gradeSchema), (req: Request, res: Response) => {
    const { grade }: { grade: string } = req.body;
    sendResult(res, recordGrade(store, req.params.studentId, req.params.courseCode, grade));
  });

  return router;
}
