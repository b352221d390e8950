// src/models/Semester.ts
export const SEMESTERS = ["SPRING", "SUMMER", "FALL"] as const;

export type Semester = (typeof SEMESTERS)[number];

export function isSemester(value: string): value is Semester {
  return SEMESTERS.some((semester) => semester === value);
}

/**
 * Case-insensitive. `undefined` means the token names no semester at all
 * ("N/A" or blank); `null` means the token is not a semester.
 */
export function parseSemester(token: string): Semester | undefined | null {
  const normalized = token.trim().toUpperCase();
  if (normalized === "" || normalized === "N/A") return undefined;
  return isSemester(normalized) ? normalized : null;
}
