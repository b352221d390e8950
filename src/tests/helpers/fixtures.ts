// src/tests/helpers/fixtures.ts
import fs from "fs";
import os from "os";
import path from "path";
import { AppConfig, loadConfig } from "../../config/config";
import { RecordStore } from "../../lib/recordStore";
import type { Result } from "../../lib/result";
import { addStudent } from "../../services/studentService";
import { addCourse } from "../../services/courseService";

export const makeTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), "campus-records-"));

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

export const testConfig = (dataDir: string): AppConfig => loadConfig({ DATA_DIR: dataDir });

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.value;
}

// S101/S102 and three courses: CS101 (3), CS102 (18), MA201 (4)
export function seededStore(): RecordStore {
  const store = new RecordStore();
  unwrap(addStudent(store, { id: "S101", regNo: "2024CS001", fullName: "Alice Mwangi", email: "alice@example.edu" }));
  unwrap(addStudent(store, { id: "S102", regNo: "2024CS002", fullName: "Brian Otieno", email: "brian@example.edu" }));
  unwrap(addCourse(store, { code: "CS101", title: "Intro to Programming", credits: 3, semester: "FALL", instructorId: "I001" }));
  unwrap(addCourse(store, { code: "CS102", title: "Data Structures", credits: 18, semester: "SPRING" }));
  unwrap(addCourse(store, { code: "MA201", title: "Linear Algebra", credits: 4, semester: "FALL" }));
  return store;
}

export const kindOf = (result: Result<unknown>) => (result.ok ? "ok" : result.error.kind);

export function studentOf(store: RecordStore, id: string) {
  const student = store.students.get(id);
  if (!student) throw new Error(`fixture student missing: ${id}`);
  return student;
}
