// src/lib/result.ts

export type ErrorKind =
  | "NotFound"
  | "AlreadyExists"
  | "InvalidInput"
  | "DuplicateEnrollment"
  | "CreditLimitExceeded"
  | "NotEnrolled"
  | "InvalidGrade"
  | "IOFailure";

export interface RecordsError {
  kind: ErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RecordsError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(kind: ErrorKind, message: string): Result<T> => ({
  ok: false,
  error: { kind, message },
});

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
