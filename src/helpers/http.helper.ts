// src/helpers/http.helper.ts
import type { Response } from "express";
import type { ErrorKind, RecordsError, Result } from "../lib/result";

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  AlreadyExists: 409,
  InvalidInput: 400,
  DuplicateEnrollment: 409,
  CreditLimitExceeded: 409,
  NotEnrolled: 409,
  InvalidGrade: 400,
  IOFailure: 500,
};

export function sendFailure(res: Response, error: RecordsError) {
  return res.status(STATUS_BY_KIND[error.kind]).json({
    success: false,
    kind: error.kind,
    message: error.message,
  });
}

export function sendResult<T>(res: Response, result: Result<T>, status = 200) {
  if (!result.ok) return sendFailure(res, result.error);
  return res.status(status).json(result.value);
}
