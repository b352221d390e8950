// src/models/Person.ts
import type { IStudent } from "./Student";
import type { IInstructor } from "./Instructor";

// Fields shared by every person kept in the records
export interface PersonBase {
  id: string;
  fullName: string;
  email: string;
}

export type Person = IStudent | IInstructor;

export interface PersonProfile {
  heading: string;
  fields: Array<[label: string, value: string]>;
}

export function describePerson(person: Person): PersonProfile {
  switch (person.kind) {
    case "student":
      return {
        heading: "Student Profile",
        fields: [
          ["ID", person.id],
          ["Registration No", person.regNo],
          ["Name", person.fullName],
          ["Email", person.email],
          ["Enrolled Courses", String(person.enrollments.length)],
        ],
      };
    case "instructor":
      return {
        heading: "Instructor Profile",
        fields: [
          ["ID", person.id],
          ["Name", person.fullName],
          ["Email", person.email],
        ],
      };
  }
}

export function formatProfile(profile: PersonProfile): string[] {
  return [`--- ${profile.heading} ---`, ...profile.fields.map(([label, value]) => `${label}: ${value}`)];
}
