// src/services/enrollmentEngine.ts
import type { AppConfig } from "../config/config";
import type { RecordStore } from "../lib/recordStore";
import { fail, ok, Result } from "../lib/result";
import type { IStudent } from "../models/Student";
import { createEnrollment, IEnrollment } from "../models/Enrollment";
import { gradePoint, parseGrade, GRADES } from "../models/Grade";

export function findEnrollment(student: IStudent, courseCode: string): IEnrollment | undefined {
  return student.enrollments.find((e) => e.course.code === courseCode);
}

// Every enrollment counts toward the ceiling, graded or not.
export function currentCredits(student: IStudent): number {
  return student.enrollments.reduce((sum, e) => sum + e.course.credits, 0);
}

/**
 * Credit-weighted mean of grade points over graded enrollments only.
 * Ungraded enrollments add nothing to either side of the division.
 */
export function calculateGPA(student: IStudent): number {
  let weightedPoints = 0;
  let gradedCredits = 0;

  for (const enrollment of student.enrollments) {
    if (enrollment.grade === undefined) continue;
    weightedPoints += gradePoint(enrollment.grade) * enrollment.course.credits;
    gradedCredits += enrollment.course.credits;
  }

  return gradedCredits > 0 ? weightedPoints / gradedCredits : 0;
}

// Synchronous from lookup to push, so no other request can interleave
// between the credit check and the append.
export function enroll(
  store: RecordStore,
  config: Pick<AppConfig, "maxCreditsPerSemester">,
  studentId: string,
  courseCode: string
): Result<IEnrollment> {
  const student = store.students.get(studentId);
  if (!student) return fail("NotFound", `Student not found: ${studentId}`);

  const course = store.courses.get(courseCode);
  if (!course) return fail("NotFound", `Course not found: ${courseCode}`);

  if (findEnrollment(student, courseCode)) {
    return fail("DuplicateEnrollment", `Student ${studentId} is already enrolled in ${courseCode}`);
  }

  const credits = currentCredits(student);
  if (credits + course.credits > config.maxCreditsPerSemester) {
    return fail(
      "CreditLimitExceeded",
      `Enrolling in ${courseCode} would take ${studentId} to ${credits + course.credits} credits (max ${config.maxCreditsPerSemester})`
    );
  }

  const enrollment = createEnrollment(student.id, course);
  student.enrollments.push(enrollment);
  return ok(enrollment);
}

// Matches on the course code alone.
export function unenroll(store: RecordStore, studentId: string, courseCode: string): Result<IEnrollment> {
  const student = store.students.get(studentId);
  if (!student) return fail("NotFound", `Student not found: ${studentId}`);

  const index = student.enrollments.findIndex((e) => e.course.code === courseCode);
  if (index === -1) {
    return fail("NotEnrolled", `Student ${studentId} is not enrolled in ${courseCode}`);
  }

  const [removed] = student.enrollments.splice(index, 1);
  return ok(removed);
}

export function recordGrade(
  store: RecordStore,
  studentId: string,
  courseCode: string,
  gradeToken: string
): Result<IEnrollment> {
  const student = store.students.get(studentId);
  if (!student) return fail("NotFound", `Student not found: ${studentId}`);

  const grade = parseGrade(gradeToken);
  if (!grade) {
    return fail("InvalidGrade", `Invalid grade "${gradeToken}". Use one of ${GRADES.join(", ")}`);
  }

  const enrollment = findEnrollment(student, courseCode);
  if (!enrollment) {
    return fail("NotEnrolled", `Student ${studentId} is not enrolled in ${courseCode}`);
  }

  enrollment.grade = grade;
  return ok(enrollment);
}
