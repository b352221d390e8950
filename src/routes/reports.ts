// src/routes/reports.ts
import { Router, Request, Response } from "express";
import type { AppContext } from "../lib/appContext";
import { formatGpaDistribution, gpaDistribution } from "../services/reportService";

export default function reportsRouter({ store }: AppContext) {
  const router = Router();

  router.get("/gpa-distribution", (req: Request, res: Response) => {
    const buckets = gpaDistribution(store);
    if (req.query.format === "text") {
      return res.type("text/plain").send(formatGpaDistribution(buckets).join("\n"));
    }
    res.json(buckets);
  });

  return router;
}
