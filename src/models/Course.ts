// src/models/Course.ts
import type { Semester } from "./Semester";

export interface ICourse {
  code: string; // e.g. "CS101"
  title: string;
  credits: number; // positive integer
  semester?: Semester;
  instructorId?: string; // back-reference, never an owned copy
}

export interface CourseInput {
  code: string;
  title: string;
  credits: number;
  semester?: Semester;
  instructorId?: string;
}

export function createCourse(input: CourseInput): ICourse {
  const course: ICourse = {
    code: input.code,
    title: input.title,
    credits: input.credits,
  };
  if (input.semester) course.semester = input.semester;
  if (input.instructorId) course.instructorId = input.instructorId;
  return course;
}

export function isValidCredits(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
