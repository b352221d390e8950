// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";

export interface ApiError extends Error {
  statusCode?: number;
  details?: unknown;
}

export class HttpError extends Error implements ApiError {
  constructor(public statusCode: number, message: string, public details?: unknown) {
    super(message);
    this.name = "HttpError";
  }
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  next: NextFunction
) {
  // Upload limits and unexpected fields are the client's fault
  const status = err instanceof multer.MulterError ? 400 : err.statusCode || 500;
  if (status >= 500) console.error(`[ERROR] ${req.method} ${req.url}`, err);

  res.status(status).json({
    success: false,
    message: err.message || "Internal Server Error",
    ...(err.details !== undefined && { details: err.details }),
  });
}
