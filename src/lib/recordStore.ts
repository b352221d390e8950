// src/lib/recordStore.ts
import type { IStudent } from "../models/Student";
import type { ICourse } from "../models/Course";
import type { IInstructor } from "../models/Instructor";
import { ensureDefaultInstructors } from "../config/defaultData";

/**
 * The in-memory tables every service works on. Maps keep insertion order,
 * which is the order listings, searches and saved files follow.
 */
export class RecordStore {
  readonly students = new Map<string, IStudent>();
  readonly courses = new Map<string, ICourse>();
  readonly instructors = new Map<string, IInstructor>();

  constructor() {
    ensureDefaultInstructors(this.instructors);
  }

  // Drops students and courses; seeded instructors stay.
  clear() {
    this.students.clear();
    this.courses.clear();
  }

  findStudentByRegNo(regNo: string): IStudent | undefined {
    for (const student of this.students.values()) {
      if (student.regNo === regNo) return student;
    }
    return undefined;
  }
}
