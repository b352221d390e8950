// src/joi/records.joi.ts
import Joi from "joi";
import { SEMESTERS } from "../models/Semester";
import type { StudentInput } from "../models/Student";
import type { StudentUpdate } from "../services/studentService";
import type { CourseDraft, CourseUpdate } from "../services/courseService";

const semester = Joi.string().valid(...SEMESTERS, "N/A").insensitive().allow("");

export const createStudentSchema = Joi.object<StudentInput>({
  id: Joi.string().trim().min(1).max(64).required(),
  regNo: Joi.string().trim().min(1).max(64).required(),
  fullName: Joi.string().trim().min(1).max(128).required(),
  email: Joi.string().trim().email().allow("").default(""),
});

export const updateStudentSchema = Joi.object<StudentUpdate>({
  fullName: Joi.string().trim().min(1).max(128).required(),
  email: Joi.string().trim().email().allow("").default(""),
});

export const createCourseSchema = Joi.object<CourseDraft>({
  code: Joi.string().trim().min(1).max(32).required(),
  title: Joi.string().trim().min(1).max(128).required(),
  credits: Joi.number().integer().positive().required(),
  semester,
  instructorId: Joi.string().trim().allow(""),
});

export const updateCourseSchema = Joi.object<CourseUpdate>({
  title: Joi.string().trim().min(1).max(128).required(),
  credits: Joi.number().integer().positive().required(),
  semester,
  instructorId: Joi.string().trim().allow(""),
});

export const enrollSchema = Joi.object<{ studentId: string; courseCode: string }>({
  studentId: Joi.string().trim().required(),
  courseCode: Joi.string().trim().required(),
});

// Letter is checked by the grading engine, not here.
export const gradeSchema = Joi.object<{ grade: string }>({
  grade: Joi.string().trim().required(),
});
