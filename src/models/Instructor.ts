// src/models/Instructor.ts
import type { PersonBase } from "./Person";

export interface IInstructor extends PersonBase {
  kind: "instructor";
}

export function createInstructor(id: string, fullName: string, email: string): IInstructor {
  return { kind: "instructor", id, fullName, email };
}
