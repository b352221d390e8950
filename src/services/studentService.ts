// src/services/studentService.ts
import type { RecordStore } from "../lib/recordStore";
import { fail, ok, Result } from "../lib/result";
import { createStudent, IStudent, StudentInput } from "../models/Student";

export interface StudentUpdate {
  fullName: string;
  email: string;
}

export function addStudent(store: RecordStore, input: StudentInput): Result<IStudent> {
  const id = input.id.trim();
  const regNo = input.regNo.trim();
  const fullName = input.fullName.trim();
  if (!id || !regNo || !fullName) {
    return fail("InvalidInput", "Student id, registration number and name are required");
  }
  if (store.students.has(id)) return fail("AlreadyExists", `Student ID already in use: ${id}`);
  if (store.findStudentByRegNo(regNo)) {
    return fail("AlreadyExists", `Registration number already in use: ${regNo}`);
  }

  const student = createStudent({ id, regNo, fullName, email: input.email.trim() });
  store.students.set(id, student);
  return ok(student);
}

export function listStudents(store: RecordStore): IStudent[] {
  return [...store.students.values()];
}

export function getStudent(store: RecordStore, id: string): Result<IStudent> {
  const student = store.students.get(id);
  return student ? ok(student) : fail("NotFound", `Student not found: ${id}`);
}

// Case-insensitive substring match on id, registration number or name.
export function searchStudents(store: RecordStore, query: string): IStudent[] {
  const needle = query.trim().toLowerCase();
  return listStudents(store).filter(
    (s) =>
      s.id.toLowerCase().includes(needle) ||
      s.regNo.toLowerCase().includes(needle) ||
      s.fullName.toLowerCase().includes(needle)
  );
}

/**
 * Replaces the record under the same key. The replacement keeps the
 * registration number and the very same enrollment list.
 */
export function updateStudent(store: RecordStore, id: string, update: StudentUpdate): Result<IStudent> {
  const existing = store.students.get(id);
  if (!existing) return fail("NotFound", `Student not found: ${id}`);

  const fullName = update.fullName.trim();
  if (!fullName) return fail("InvalidInput", "Student name is required");

  const replacement = createStudent(
    { id, regNo: existing.regNo, fullName, email: update.email.trim() },
    existing.enrollments
  );
  store.students.set(id, replacement);
  return ok(replacement);
}

export function deleteStudent(store: RecordStore, id: string): Result<IStudent> {
  const student = store.students.get(id);
  if (!student) return fail("NotFound", `Student not found: ${id}`);
  store.students.delete(id);
  return ok(student);
}
