// src/services/reportService.ts
import type { RecordStore } from "../lib/recordStore";
import { fail, ok, Result } from "../lib/result";
import { describePerson, formatProfile, PersonProfile } from "../models/Person";
import type { Grade } from "../models/Grade";
import type { Semester } from "../models/Semester";
import { calculateGPA, currentCredits } from "./enrollmentEngine";

export interface GpaBucket {
  bucket: number;
  range: string; // "[8, 9)"
  count: number;
}

export interface TranscriptLine {
  courseCode: string;
  title: string;
  credits: number;
  semester: Semester | "N/A";
  grade: Grade | "N/A";
}

export interface Transcript {
  profile: PersonProfile;
  studentId: string;
  regNo: string;
  fullName: string;
  email: string;
  currentCredits: number;
  gpa: number; // two decimals
  enrollments: TranscriptLine[];
}

/** Students grouped by floor(GPA); empty buckets left out, ascending. */
export function gpaDistribution(store: RecordStore): GpaBucket[] {
  const counts = new Map<number, number>();
  for (const student of store.students.values()) {
    const bucket = Math.floor(calculateGPA(student));
    counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a - b)
    .map(([bucket, count]) => ({ bucket, range: `[${bucket}, ${bucket + 1})`, count }));
}

export function formatGpaDistribution(buckets: GpaBucket[]): string[] {
  return [
    "--- GPA Distribution Report ---",
    ...buckets.map((b) => `GPA Range ${b.bucket}-${b.bucket + 1}: ${b.count} students`),
  ];
}

export function getTranscript(store: RecordStore, studentId: string): Result<Transcript> {
  const student = store.students.get(studentId);
  if (!student) return fail("NotFound", `Student not found: ${studentId}`);

  return ok({
    profile: describePerson(student),
    studentId: student.id,
    regNo: student.regNo,
    fullName: student.fullName,
    email: student.email,
    currentCredits: currentCredits(student),
    gpa: Number(calculateGPA(student).toFixed(2)),
    enrollments: student.enrollments.map((e) => ({
      courseCode: e.course.code,
      title: e.course.title,
      credits: e.course.credits,
      semester: e.course.semester ?? "N/A",
      grade: e.grade ?? "N/A",
    })),
  });
}

export function formatTranscript(transcript: Transcript): string[] {
  const lines = [
    ...formatProfile(transcript.profile),
    `Current Credits: ${transcript.currentCredits}`,
    `GPA: ${transcript.gpa.toFixed(2)}`,
  ];
  if (transcript.enrollments.length === 0) {
    lines.push("  No courses enrolled.");
  }
  for (const e of transcript.enrollments) {
    lines.push(`  ${e.courseCode} ${e.title} (${e.credits} credits, ${e.semester}) grade ${e.grade}`);
  }
  return lines;
}
