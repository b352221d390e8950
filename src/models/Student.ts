// src/models/Student.ts
import type { PersonBase } from "./Person";
import type { IEnrollment } from "./Enrollment";

export interface IStudent extends PersonBase {
  kind: "student";
  regNo: string; // e.g. "2024CS017"
  enrollments: IEnrollment[]; // enrollment order
}

export interface StudentInput {
  id: string;
  regNo: string;
  fullName: string;
  email: string;
}

export function createStudent(input: StudentInput, enrollments: IEnrollment[] = []): IStudent {
  return {
    kind: "student",
    id: input.id,
    regNo: input.regNo,
    fullName: input.fullName,
    email: input.email,
    enrollments,
  };
}
