// src/services/recordsImporter.ts
import papa from "papaparse";
import type { RecordStore } from "../lib/recordStore";
import { addStudent } from "./studentService";
import { addCourse } from "./courseService";

export const STUDENT_IMPORT_HEADERS = ["regNo", "fullName", "email"];
export const COURSE_IMPORT_HEADERS = ["code", "title", "credits", "instructor", "semester", "department"];

export interface ImportResult {
  total: number;
  success: number;
  errors: string[];
  warnings: string[];
}

interface ImportRow {
  line: number;
  fields: string[];
}

// Rows of an import file; a leading header line is recognised by its first column.
function parseImportRows(text: string, firstHeader: string): ImportRow[] {
  const parsed = papa.parse<string[]>(text, {
    delimiter: ",",
    skipEmptyLines: "greedy",
    transform: (v) => v.trim(),
  });
  if (parsed.errors.length) throw new Error(`CSV parse error: ${parsed.errors[0].message}`);

  const rows = parsed.data.map((fields, index) => ({ line: index + 1, fields }));
  if (rows.length > 0 && rows[0].fields[0]?.toLowerCase() === firstHeader.toLowerCase()) {
    rows.shift();
  }
  return rows;
}

/** Next free id of the form S001, one past the highest numbered S-id in the store. */
export function nextStudentId(store: RecordStore): string {
  let highest = 0;
  for (const id of store.students.keys()) {
    const match = /^S(\d+)$/.exec(id);
    if (match) highest = Math.max(highest, Number(match[1]));
  }
  return `S${String(highest + 1).padStart(3, "0")}`;
}

export function importStudents(store: RecordStore, text: string): ImportResult {
  const result: ImportResult = { total: 0, success: 0, errors: [], warnings: [] };

  for (const { line, fields } of parseImportRows(text, STUDENT_IMPORT_HEADERS[0])) {
    result.total++;
    if (fields.length !== STUDENT_IMPORT_HEADERS.length) {
      result.errors.push(`Row ${line}: expected ${STUDENT_IMPORT_HEADERS.join(",")}`);
      continue;
    }

    const [regNo, fullName, email] = fields;
    const added = addStudent(store, { id: nextStudentId(store), regNo, fullName, email });
    if (!added.ok) {
      result.errors.push(`Row ${line}: ${added.error.message}`);
      continue;
    }
    result.success++;
  }

  return result;
}

export function importCourses(store: RecordStore, text: string): ImportResult {
  const result: ImportResult = { total: 0, success: 0, errors: [], warnings: [] };

  for (const { line, fields } of parseImportRows(text, COURSE_IMPORT_HEADERS[0])) {
    result.total++;
    if (fields.length !== COURSE_IMPORT_HEADERS.length) {
      result.errors.push(`Row ${line}: expected ${COURSE_IMPORT_HEADERS.join(",")}`);
      continue;
    }

    // department is accepted but not kept
    const [code, title, credits, instructor, semester] = fields;
    const named = instructor && instructor.toUpperCase() !== "N/A" ? instructor : undefined;
    const instructorId = named && store.instructors.has(named) ? named : undefined;
    if (named && !instructorId) {
      result.warnings.push(`Row ${line}: instructor ${named} not found, course stored without one`);
    }

    const added = addCourse(store, { code, title, credits: Number(credits), semester, instructorId });
    if (!added.ok) {
      result.errors.push(`Row ${line}: ${added.error.message}`);
      continue;
    }
    result.success++;
  }

  return result;
}
