// src/services/recordsPersistence.ts
import fs from "fs";
import path from "path";
import papa from "papaparse";
import type { AppConfig } from "../config/config";
import type { RecordStore } from "../lib/recordStore";
import { describeError, RecordsError } from "../lib/result";
import { createStudent } from "../models/Student";
import { createCourse, isValidCredits } from "../models/Course";
import { createEnrollment } from "../models/Enrollment";
import { parseSemester } from "../models/Semester";
import { parseGrade } from "../models/Grade";
import { findEnrollment } from "./enrollmentEngine";

export const STUDENTS_FILE = "students.csv";
export const COURSES_FILE = "courses.csv";
export const ENROLLMENT_FILE = "enrollment.csv";
export const DATA_FILES = [STUDENTS_FILE, COURSES_FILE, ENROLLMENT_FILE] as const;

export const STUDENT_HEADERS = ["id", "regNo", "fullName", "email"];
export const COURSE_HEADERS = ["code", "title", "credits", "instructorId", "semester"];
export const ENROLLMENT_HEADERS = ["studentId", "courseCode", "grade"];

const NONE = "N/A";

export interface DropCounts {
  malformed: number;
  dangling: number;
  duplicate: number;
}

export interface LoadReport {
  ok: boolean;
  students: number;
  courses: number;
  enrollments: number;
  dropped: DropCounts;
  warnings: string[];
  error?: RecordsError;
}

export interface SaveReport {
  ok: boolean;
  written: string[];
  error?: RecordsError;
}

// Data rows of a table, header removed. null when the file does not exist.
function readTable(filePath: string, report: LoadReport): string[][] | null {
  if (!fs.existsSync(filePath)) return null;

  const text = fs.readFileSync(filePath, "utf-8");
  const parsed = papa.parse<string[]>(text, {
    delimiter: ",",
    skipEmptyLines: "greedy",
    transform: (v) => v.trim(),
  });
  for (const err of parsed.errors) {
    report.warnings.push(`${path.basename(filePath)}: ${err.message} (row ${(err.row ?? 0) + 1})`);
  }
  return parsed.data.slice(1);
}

function writeTable(filePath: string, fields: string[], data: string[][]) {
  const csv = papa.unparse({ fields, data }, { newline: "\n" });
  fs.writeFileSync(filePath, `${csv}\n`, "utf-8");
}

function drop(report: LoadReport, reason: keyof DropCounts, message: string) {
  report.dropped[reason]++;
  report.warnings.push(message);
}

/**
 * Replaces the store's students and courses with the contents of the data
 * directory. Rows that cannot be used are skipped, counted by reason and
 * listed in `warnings`; an I/O failure ends the load with whatever was read
 * so far.
 */
export function loadRecords(store: RecordStore, config: Pick<AppConfig, "dataDir">): LoadReport {
  const report: LoadReport = {
    ok: true,
    students: 0,
    courses: 0,
    enrollments: 0,
    dropped: { malformed: 0, dangling: 0, duplicate: 0 },
    warnings: [],
  };

  store.clear();

  try {
    // 1. Students
    const studentRows = readTable(path.join(config.dataDir, STUDENTS_FILE), report) ?? [];
    for (const [index, row] of studentRows.entries()) {
      const where = `${STUDENTS_FILE} row ${index + 1}`;
      if (row.length !== STUDENT_HEADERS.length) {
        drop(report, "malformed", `${where}: expected ${STUDENT_HEADERS.length} fields, got ${row.length}`);
        continue;
      }
      const [id, regNo, fullName, email] = row;
      if (!id || !regNo) {
        drop(report, "malformed", `${where}: id and regNo are required`);
        continue;
      }
      if (store.students.has(id) || store.findStudentByRegNo(regNo)) {
        drop(report, "duplicate", `${where}: student ${id} / ${regNo} already loaded`);
        continue;
      }
      store.students.set(id, createStudent({ id, regNo, fullName, email }));
      report.students++;
    }

    // 2. Courses (instructors are seeded, never read from disk)
    const courseRows = readTable(path.join(config.dataDir, COURSES_FILE), report) ?? [];
    for (const [index, row] of courseRows.entries()) {
      const where = `${COURSES_FILE} row ${index + 1}`;
      if (row.length !== COURSE_HEADERS.length) {
        drop(report, "malformed", `${where}: expected ${COURSE_HEADERS.length} fields, got ${row.length}`);
        continue;
      }
      const [code, title, creditsRaw, instructorId, semesterRaw] = row;
      const credits = Number(creditsRaw);
      const semester = parseSemester(semesterRaw);
      if (!code || !isValidCredits(credits) || semester === null) {
        drop(report, "malformed", `${where}: invalid code, credits or semester`);
        continue;
      }
      if (store.courses.has(code)) {
        drop(report, "duplicate", `${where}: course ${code} already loaded`);
        continue;
      }
      const named = instructorId && instructorId.toUpperCase() !== NONE ? instructorId : undefined;
      if (named && !store.instructors.has(named)) {
        report.warnings.push(`${where}: instructor ${named} not found, course ${code} loaded without one`);
      }
      store.courses.set(
        code,
        createCourse({
          code,
          title,
          credits,
          semester,
          instructorId: named && store.instructors.has(named) ? named : undefined,
        })
      );
      report.courses++;
    }

    // 3. Enrollments, stitched onto students and courses loaded above
    const enrollmentRows = readTable(path.join(config.dataDir, ENROLLMENT_FILE), report) ?? [];
    for (const [index, row] of enrollmentRows.entries()) {
      const where = `${ENROLLMENT_FILE} row ${index + 1}`;
      if (row.length !== ENROLLMENT_HEADERS.length) {
        drop(report, "malformed", `${where}: expected ${ENROLLMENT_HEADERS.length} fields, got ${row.length}`);
        continue;
      }
      const [studentId, courseCode, gradeRaw] = row;
      const student = store.students.get(studentId);
      const course = store.courses.get(courseCode);
      if (!student || !course) {
        drop(report, "dangling", `${where}: unknown ${student ? "course " + courseCode : "student " + studentId}`);
        continue;
      }
      const grade = gradeRaw === "" ? undefined : parseGrade(gradeRaw);
      if (gradeRaw !== "" && !grade) {
        drop(report, "malformed", `${where}: unknown grade "${gradeRaw}"`);
        continue;
      }
      if (findEnrollment(student, courseCode)) {
        drop(report, "duplicate", `${where}: ${studentId} already enrolled in ${courseCode}`);
        continue;
      }
      student.enrollments.push(createEnrollment(student.id, course, grade));
      report.enrollments++;
    }
  } catch (err) {
    console.error("❌ Failed to load records:", err);
    report.ok = false;
    report.error = { kind: "IOFailure", message: describeError(err) };
  }

  for (const warning of report.warnings) console.warn(`⚠️ ${warning}`);
  if (report.ok) {
    console.log(
      `✅ Loaded ${report.students} students, ${report.courses} courses, ${report.enrollments} enrollments from ${config.dataDir}`
    );
  }
  return report;
}

/** Overwrites the three data files: students, then courses, then enrollments. */
export function saveRecords(store: RecordStore, config: Pick<AppConfig, "dataDir">): SaveReport {
  const report: SaveReport = { ok: true, written: [] };

  try {
    fs.mkdirSync(config.dataDir, { recursive: true });

    const students = [...store.students.values()];
    writeTable(
      path.join(config.dataDir, STUDENTS_FILE),
      STUDENT_HEADERS,
      students.map((s) => [s.id, s.regNo, s.fullName, s.email])
    );
    report.written.push(STUDENTS_FILE);

    writeTable(
      path.join(config.dataDir, COURSES_FILE),
      COURSE_HEADERS,
      [...store.courses.values()].map((c) => [
        c.code,
        c.title,
        String(c.credits),
        c.instructorId ?? NONE,
        c.semester ?? NONE,
      ])
    );
    report.written.push(COURSES_FILE);

    // Derived from each student's list; enrollments have no table in memory.
    writeTable(
      path.join(config.dataDir, ENROLLMENT_FILE),
      ENROLLMENT_HEADERS,
      students.flatMap((s) => s.enrollments.map((e) => [s.id, e.course.code, e.grade ?? ""]))
    );
    report.written.push(ENROLLMENT_FILE);

    console.log(`✅ Records saved to ${config.dataDir}`);
  } catch (err) {
    console.error("❌ Failed to save records:", err);
    report.ok = false;
    report.error = { kind: "IOFailure", message: describeError(err) };
  }

  return report;
}
