// src/tests/api.test.ts
import fs from "fs";
import path from "path";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../app";
import { AppContext, createAppContext } from "../lib/appContext";
import { ENROLLMENT_FILE } from "../services/recordsPersistence";
import { makeTempDir, removeDir, seededStore, testConfig } from "./helpers/fixtures";

describe("Records API", () => {
  let dir: string;
  let context: AppContext;
  let app: Express;

  beforeEach(() => {
    dir = makeTempDir();
    context = createAppContext(testConfig(dir), seededStore());
    app = createApp(context);
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
  });

  it("answers the health check", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "OK", students: 2, courses: 3 });
  });

  describe("students", () => {
    it("creates, lists and fetches a student", async () => {
      const created = await request(app)
        .post("/students")
        .send({ id: "S200", regNo: "2025BT001", fullName: "Hana Sato", email: "hana@example.edu" });
      expect(created.status).toBe(201);
      expect(created.body).toEqual({
        kind: "student",
        id: "S200",
        regNo: "2025BT001",
        fullName: "Hana Sato",
        email: "hana@example.edu",
        enrollments: [],
      });

      const list = await request(app).get("/students");
      expect(list.body.map((s: { id: string }) => s.id)).toEqual(["S101", "S102", "S200"]);

      const one = await request(app).get("/students/S200");
      expect(one.status).toBe(200);
      expect(one.body.fullName).toBe("Hana Sato");
    });

    it("rejects an invalid body before it reaches the records", async () => {
      const res = await request(app).post("/students").send({ id: "S300", email: "not-an-email" });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Validation failed");
      expect(context.store.students.has("S300")).toBe(false);
    });

    it("maps a duplicate registration number to 409", async () => {
      const res = await request(app)
        .post("/students")
        .send({ id: "S300", regNo: "2024CS001", fullName: "Copy", email: "" });
      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        success: false,
        kind: "AlreadyExists",
        message: "Registration number already in use: 2024CS001",
      });
    });

    it("searches, updates and deletes", async () => {
      const search = await request(app).get("/students/search").query({ q: "brian" });
      expect(search.body.map((s: { id: string }) => s.id)).toEqual(["S102"]);

      const missingQuery = await request(app).get("/students/search");
      expect(missingQuery.status).toBe(400);

      const updated = await request(app)
        .put("/students/S102")
        .send({ fullName: "Brian O. Otieno", email: "bo@example.edu" });
      expect(updated.status).toBe(200);
      expect(context.store.students.get("S102")?.fullName).toBe("Brian O. Otieno");

      expect((await request(app).delete("/students/S102")).status).toBe(200);
      expect((await request(app).get("/students/S102")).status).toBe(404);
    });
  });

  describe("courses and instructors", () => {
    it("creates a course with a converted credit count", async () => {
      const res = await request(app)
        .post("/courses")
        .send({ code: "BI110", title: "Cell Biology", credits: "3", semester: "summer", instructorId: "I001" });
      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        code: "BI110",
        title: "Cell Biology",
        credits: 3,
        semester: "SUMMER",
        instructorId: "I001",
      });
    });

    it("rejects a non-positive credit count", async () => {
      const res = await request(app).post("/courses").send({ code: "BI111", title: "X", credits: 0 });
      expect(res.status).toBe(400);
    });

    it("updates, searches and deletes courses", async () => {
      const updated = await request(app).put("/courses/MA201").send({ title: "Matrices", credits: 5 });
      expect(updated.body).toEqual({ code: "MA201", title: "Matrices", credits: 5 });

      const search = await request(app).get("/courses/search").query({ q: "matri" });
      expect(search.body.map((c: { code: string }) => c.code)).toEqual(["MA201"]);

      expect((await request(app).delete("/courses/MA201")).status).toBe(200);
      expect((await request(app).get("/courses/MA201")).status).toBe(404);
    });

    it("shows the seeded instructor profile", async () => {
      const res = await request(app).get("/instructors/I001");
      expect(res.status).toBe(200);
      expect(res.body.profile.heading).toBe("Instructor Profile");
      expect((await request(app).get("/instructors/I404")).status).toBe(404);
    });
  });

  describe("enrollment and grades", () => {
    it("enrolls, refuses the credit-crossing course and records a grade", async () => {
      const first = await request(app).post("/enrollments").send({ studentId: "S101", courseCode: "CS101" });
      expect(first.status).toBe(201);
      expect(first.body).toMatchObject({ studentId: "S101", course: { code: "CS101" } });

      const crossing = await request(app).post("/enrollments").send({ studentId: "S101", courseCode: "CS102" });
      expect(crossing.status).toBe(409);
      expect(crossing.body.kind).toBe("CreditLimitExceeded");

      const duplicate = await request(app).post("/enrollments").send({ studentId: "S101", courseCode: "CS101" });
      expect(duplicate.body.kind).toBe("DuplicateEnrollment");

      const graded = await request(app).put("/enrollments/S101/CS101/grade").send({ grade: "a" });
      expect(graded.status).toBe(200);
      expect(graded.body.grade).toBe("A");

      const invalid = await request(app).put("/enrollments/S101/CS101/grade").send({ grade: "Z" });
      expect(invalid.status).toBe(400);
      expect(invalid.body.kind).toBe("InvalidGrade");

      const transcript = await request(app).get("/students/S101/transcript");
      expect(transcript.body).toMatchObject({ currentCredits: 3, gpa: 9 });
    });

    it("unenrolls and reports NotEnrolled the second time", async () => {
      await request(app).post("/enrollments").send({ studentId: "S102", courseCode: "MA201" });
      expect((await request(app).delete("/enrollments/S102/MA201")).status).toBe(200);

      const again = await request(app).delete("/enrollments/S102/MA201");
      expect(again.status).toBe(409);
      expect(again.body.kind).toBe("NotEnrolled");
    });

    it("returns 404 for an unknown student", async () => {
      const res = await request(app).post("/enrollments").send({ studentId: "S999", courseCode: "CS101" });
      expect(res.status).toBe(404);
      expect(res.body.kind).toBe("NotFound");
    });
  });

  describe("reports", () => {
    it("returns the GPA distribution as JSON and as text", async () => {
      await request(app).post("/enrollments").send({ studentId: "S101", courseCode: "MA201" });
      await request(app).put("/enrollments/S101/MA201/grade").send({ grade: "B" });

      const json = await request(app).get("/reports/gpa-distribution");
      expect(json.body).toEqual([
        { bucket: 0, range: "[0, 1)", count: 1 },
        { bucket: 8, range: "[8, 9)", count: 1 },
      ]);

      const text = await request(app).get("/reports/gpa-distribution").query({ format: "text" });
      expect(text.text).toBe(
        "--- GPA Distribution Report ---\nGPA Range 0-1: 1 students\nGPA Range 8-9: 1 students"
      );
    });
  });

  describe("maintenance", () => {
    it("saves, reloads and backs up", async () => {
      await request(app).post("/enrollments").send({ studentId: "S101", courseCode: "CS101" });

      const saved = await request(app).post("/maintenance/save");
      expect(saved.status).toBe(200);
      expect(fs.readFileSync(path.join(dir, ENROLLMENT_FILE), "utf-8")).toBe("studentId,courseCode,grade\nS101,CS101,\n");

      context.store.students.clear();
      const loaded = await request(app).post("/maintenance/load");
      expect(loaded.body).toMatchObject({ ok: true, students: 2, courses: 3, enrollments: 1 });
      expect(context.store.students.get("S101")?.enrollments).toHaveLength(1);

      const backup = await request(app).post("/maintenance/backup");
      expect(backup.status).toBe(201);
      expect(backup.body.copied).toHaveLength(3);
      expect(fs.existsSync(backup.body.directory)).toBe(true);
    });

    it("imports an uploaded student file", async () => {
      const res = await request(app)
        .post("/maintenance/import/students")
        .attach("file", Buffer.from("regNo,fullName,email\n2025LW001,Ines Costa,ines@example.edu\n"), "students.csv");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ total: 1, success: 1, errors: [], warnings: [] });
      expect(context.store.students.get("S103")?.fullName).toBe("Ines Costa");
    });

    it("rejects uploads that are not CSV", async () => {
      const res = await request(app)
        .post("/maintenance/import/courses")
        .attach("file", Buffer.from("binary"), "courses.xlsx");
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Only CSV or text files allowed");
    });

    it("rejects uploads over the 2MB limit", async () => {
      const res = await request(app)
        .post("/maintenance/import/students")
        .attach("file", Buffer.alloc(2 * 1024 * 1024 + 1, "a"), "students.csv");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, message: "File too large" });
    });

    it("requires a file", async () => {
      const res = await request(app).post("/maintenance/import/courses");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, message: "No file uploaded (field name: file)" });
    });
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/nowhere");
    expect(res.status).toBe(404);
    expect(res.body.message).toBe("Route /nowhere not found");
  });
});
