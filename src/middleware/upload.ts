// src/middleware/upload.ts
import multer from "multer";
import path from "path";
import { HttpError } from "./errorHandler";

const storage = multer.memoryStorage();

export const uploadImportFile = multer({
  storage,
  limits: { fileSize: 2 * 1024 * 1024 }, // 2MB
  fileFilter: (req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (![".csv", ".txt"].includes(ext)) {
      return cb(new HttpError(400, "Only CSV or text files allowed"));
    }
    cb(null, true);
  },
});
