// src/models/Grade.ts

// Letter -> grade point
export const GRADE_POINTS = {
  S: 10,
  A: 9,
  B: 8,
  C: 7,
  D: 6,
  E: 5,
  F: 0,
} as const;

export type Grade = keyof typeof GRADE_POINTS;

export const GRADES: readonly Grade[] = ["S", "A", "B", "C", "D", "E", "F"];

export function isGrade(value: string): value is Grade {
  return Object.prototype.hasOwnProperty.call(GRADE_POINTS, value);
}

// Never throws: anything that is not a known letter comes back undefined.
export function parseGrade(token: string): Grade | undefined {
  const normalized = token.trim().toUpperCase();
  return isGrade(normalized) ? normalized : undefined;
}

export function gradePoint(grade: Grade): number {
  return GRADE_POINTS[grade];
}
