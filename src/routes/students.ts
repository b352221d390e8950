// src/routes/students.ts
import { Router, Request, Response } from "express";
import type { AppContext } from "../lib/appContext";
import { validateBody } from "../middleware/validate";
import { createStudentSchema, updateStudentSchema } from "../joi/records.joi";
import { sendResult } from "../helpers/http.helper";
import {
  addStudent,
  deleteStudent,
  getStudent,
  listStudents,
  searchStudents,
  StudentUpdate,
  updateStudent,
} from "../services/studentService";
import type { StudentInput } from "../models/Student";
import { formatTranscript, getTranscript } from "../services/reportService";

export default function studentsRouter({ store }: AppContext) {
  const router = Router();

  router.get("/", (req: Request, res: Response) => {
    res.json(listStudents(store));
  });

  // SEARCH by id, regNo or name
  router.get("/search", (req: Request, res: Response) => {
    const { q } = req.query;
    if (typeof q !== "string" || !q.trim()) {
      return res.status(400).json({ success: false, message: "Query parameter q is required" });
    }
    res.json(searchStudents(store, q));
  });

  router.get("/:id", (req: Request, res: Response) => {
    sendResult(res, getStudent(store, req.params.id));
  });

  router.get("/:id/transcript", (req: Request, res: Response) => {
    const transcript = getTranscript(store, req.params.id);
    if (transcript.ok && req.query.format === "text") {
      return res.type("text/plain").send(formatTranscript(transcript.value).join("\n"));
    }
    sendResult(res, transcript);
  });

  router.post("/", validateBody(createStudentSchema), (req: Request, res: Response) => {
    const input: StudentInput = req.body;
    sendResult(res, addStudent(store, input), 201);
  });

  router.put("/:id", validateBody(updateStudentSchema), (req: Request, res: Response) => {
    const update: StudentUpdate = req.body;
    sendResult(res, updateStudent(store, req.params.id, update));
  });

  router.delete("/:id", (req: Request, res: Response) => {
    sendResult(res, deleteStudent(store, req.params.id));
  });

  return router;
}
