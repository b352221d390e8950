// src/routes/instructors.ts
import { Router, Request, Response } from "express";
import type { AppContext } from "../lib/appContext";
import { describePerson } from "../models/Person";

export default function instructorsRouter({ store }: AppContext) {
  const router = Router();

  router.get("/", (req: Request, res: Response) => {
    res.json([...store.instructors.values()]);
  });

  router.get("/:id", (req: Request, res: Response) => {
    const instructor = store.instructors.get(req.params.id);
    if (!instructor) {
      return res.status(404).json({ success: false, kind: "NotFound", message: "Instructor not found" });
    }
    res.json({ ...instructor, profile: describePerson(instructor) });
  });

  return router;
}
