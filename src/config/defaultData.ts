// src/config/defaultData.ts
import { createInstructor, IInstructor } from "../models/Instructor";

// Instructors are not persisted; every store starts with these.
export const DEFAULT_INSTRUCTORS: readonly IInstructor[] = [
  createInstructor("I001", "Dr. Jane Doe", "jdoe@campus.edu"),
];

export const ensureDefaultInstructors = (instructors: Map<string, IInstructor>) => {
  for (const instructor of DEFAULT_INSTRUCTORS) {
    if (!instructors.has(instructor.id)) {
      instructors.set(instructor.id, { ...instructor });
    }
  }
};
