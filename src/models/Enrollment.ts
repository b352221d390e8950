// src/models/Enrollment.ts
import type { ICourse } from "./Course";
import type { Grade } from "./Grade";

// Owned by the student's enrollment list; the course is shared with the store.
export interface IEnrollment {
  studentId: string;
  course: ICourse;
  grade?: Grade; // undefined until graded
}

export function createEnrollment(studentId: string, course: ICourse, grade?: Grade): IEnrollment {
  const enrollment: IEnrollment = { studentId, course };
  if (grade) enrollment.grade = grade;
  return enrollment;
}
