// src/routes/maintenance.ts
import { Router, Request, Response } from "express";
import type { AppContext } from "../lib/appContext";
import { describeError } from "../lib/result";
import { HttpError } from "../middleware/errorHandler";
import { createMaintenanceRateLimiter } from "../middleware/security";
import { uploadImportFile } from "../middleware/upload";
import { loadRecords, saveRecords } from "../services/recordsPersistence";
import { createBackup } from "../services/backupService";
import { importCourses, importStudents, ImportResult } from "../services/recordsImporter";
import type { RecordStore } from "../lib/recordStore";

type Importer = (store: RecordStore, text: string) => ImportResult;

export default function maintenanceRouter({ store, config }: AppContext) {
  const router = Router();
  router.use(createMaintenanceRateLimiter());

  // 1. RELOAD FROM DISK (replaces in-memory records)
  router.post("/load", (req: Request, res: Response) => {
    const report = loadRecords(store, config);
    res.status(report.ok ? 200 : 500).json(report);
  });

  // 2. SAVE TO DISK
  router.post("/save", (req: Request, res: Response) => {
    const report = saveRecords(store, config);
    res.status(report.ok ? 200 : 500).json(report);
  });

  // 3. TIMESTAMPED BACKUP OF THE SAVED FILES
  router.post("/backup", (req: Request, res: Response) => {
    const result = createBackup(config);
    res.status(result.ok ? 201 : 500).json(result);
  });

  // 4. IMPORT
  const importHandler = (runImport: Importer) => (req: Request, res: Response) => {
    if (!req.file) throw new HttpError(400, "No file uploaded (field name: file)");

    let result: ImportResult;
    try {
      result = runImport(store, req.file.buffer.toString("utf-8"));
    } catch (err) {
      throw new HttpError(400, describeError(err));
    }

    for (const warning of result.warnings) console.warn(`⚠️ ${warning}`);
    console.log(`📥 Imported ${result.success}/${result.total} rows from ${req.file.originalname}`);
    res.json(result);
  };

  router.post("/import/students", uploadImportFile.single("file"), importHandler(importStudents));
  router.post("/import/courses", uploadImportFile.single("file"), importHandler(importCourses));

  return router;
}
