// src/services/courseService.ts
import type { AppConfig } from "../config/config";
import type { RecordStore } from "../lib/recordStore";
import { fail, ok, Result } from "../lib/result";
import { createCourse, ICourse, isValidCredits } from "../models/Course";
import { parseSemester, Semester, SEMESTERS } from "../models/Semester";
import { currentCredits, findEnrollment } from "./enrollmentEngine";

// Course fields as they arrive from a request or an import row
export interface CourseDraft {
  code: string;
  title: string;
  credits: number;
  semester?: string;
  instructorId?: string;
}

export type CourseUpdate = Omit<CourseDraft, "code">;

interface CheckedFields {
  title: string;
  credits: number;
  semester?: Semester;
  instructorId?: string;
}

function checkFields(store: RecordStore, draft: CourseUpdate): Result<CheckedFields> {
  const title = draft.title.trim();
  if (!title) return fail("InvalidInput", "Course title is required");

  if (!isValidCredits(draft.credits)) {
    return fail("InvalidInput", `Credits must be a positive whole number, got ${draft.credits}`);
  }

  const semester = parseSemester(draft.semester ?? "");
  if (semester === null) {
    return fail("InvalidInput", `Unknown semester "${draft.semester}". Use ${SEMESTERS.join(", ")}`);
  }

  const instructorId = draft.instructorId?.trim() || undefined;
  if (instructorId && !store.instructors.has(instructorId)) {
    return fail("NotFound", `Instructor not found: ${instructorId}`);
  }

  return ok({ title, credits: draft.credits, semester, instructorId });
}

export function addCourse(store: RecordStore, draft: CourseDraft): Result<ICourse> {
  const code = draft.code.trim();
  if (!code) return fail("InvalidInput", "Course code is required");
  if (store.courses.has(code)) return fail("AlreadyExists", `Course code already in use: ${code}`);

  const checked = checkFields(store, draft);
  if (!checked.ok) return checked;

  const course = createCourse({ code, ...checked.value });
  store.courses.set(code, course);
  return ok(course);
}

export function listCourses(store: RecordStore): ICourse[] {
  return [...store.courses.values()];
}

export function getCourse(store: RecordStore, code: string): Result<ICourse> {
  const course = store.courses.get(code);
  return course ? ok(course) : fail("NotFound", `Course not found: ${code}`);
}

// Case-insensitive substring match on code or title.
export function searchCourses(store: RecordStore, query: string): ICourse[] {
  const needle = query.trim().toLowerCase();
  return listCourses(store).filter(
    (c) => c.code.toLowerCase().includes(needle) || c.title.toLowerCase().includes(needle)
  );
}

/**
 * Updates the stored course object itself, so enrollments that point at it
 * pick up the new title and credits. A credit change that would take any
 * enrolled student past the ceiling is refused and nothing changes.
 */
export function updateCourse(
  store: RecordStore,
  config: Pick<AppConfig, "maxCreditsPerSemester">,
  code: string,
  update: CourseUpdate
): Result<ICourse> {
  const course = store.courses.get(code);
  if (!course) return fail("NotFound", `Course not found: ${code}`);

  const checked = checkFields(store, update);
  if (!checked.ok) return checked;

  const { title, credits, semester, instructorId } = checked.value;
  for (const student of store.students.values()) {
    const enrollment = findEnrollment(student, code);
    if (!enrollment) continue;
    const total = currentCredits(student) - enrollment.course.credits + credits;
    if (total > config.maxCreditsPerSemester) {
      return fail(
        "CreditLimitExceeded",
        `${credits} credits for ${code} would take ${student.id} to ${total} credits (max ${config.maxCreditsPerSemester})`
      );
    }
  }

  course.title = title;
  course.credits = credits;
  if (semester) course.semester = semester;
  else delete course.semester;
  if (instructorId) course.instructorId = instructorId;
  else delete course.instructorId;

  return ok(course);
}

// Unenrolls every student from the course before removing it.
export function deleteCourse(store: RecordStore, code: string): Result<ICourse> {
  const course = store.courses.get(code);
  if (!course) return fail("NotFound", `Course not found: ${code}`);

  for (const student of store.students.values()) {
    student.enrollments = student.enrollments.filter((e) => e.course.code !== code);
  }
  store.courses.delete(code);
  return ok(course);
}
