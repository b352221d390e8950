// src/tests/backupService.test.ts
import fs from "fs";
import path from "path";
import { backupDirName, createBackup } from "../services/backupService";
import { COURSES_FILE, ENROLLMENT_FILE, saveRecords, STUDENTS_FILE } from "../services/recordsPersistence";
import { runBackup } from "../scripts/createBackup";
import { makeTempDir, removeDir, seededStore, testConfig } from "./helpers/fixtures";

describe("Backup", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
  });

  it("names the directory after the local date and time", () => {
    expect(backupDirName(new Date(2026, 9, 19, 8, 5, 3))).toBe("backup_20261019_080503");
    expect(backupDirName(new Date(2025, 0, 2, 23, 59, 59))).toBe("backup_20250102_235959");
  });

  it("copies the saved files into the timestamped directory", () => {
    const config = testConfig(dir);
    saveRecords(seededStore(), config);

    const result = createBackup(config, new Date(2026, 9, 19, 8, 5, 3));
    const expectedDir = path.join(dir, "backup_20261019_080503");

    expect(result).toEqual({
      ok: true,
      directory: expectedDir,
      copied: [STUDENTS_FILE, COURSES_FILE, ENROLLMENT_FILE],
      skipped: [],
    });
    expect(fs.readFileSync(path.join(expectedDir, STUDENTS_FILE), "utf-8")).toBe(
      fs.readFileSync(path.join(dir, STUDENTS_FILE), "utf-8")
    );
  });

  it("skips files that were never saved", () => {
    fs.writeFileSync(path.join(dir, COURSES_FILE), "code,title,credits,instructorId,semester\n");

    const result = createBackup(testConfig(dir), new Date(2026, 0, 1, 0, 0, 0));
    expect(result.ok).toBe(true);
    expect(result.copied).toEqual([COURSES_FILE]);
    expect(result.skipped).toEqual([STUDENTS_FILE, ENROLLMENT_FILE]);
    expect(fs.readdirSync(result.directory)).toEqual([COURSES_FILE]);
  });

  it("reports a failure instead of throwing", () => {
    jest.spyOn(console, "error").mockImplementation(() => {});
    const blocker = path.join(dir, "file");
    fs.writeFileSync(blocker, "x");

    const result = createBackup(testConfig(blocker));
    expect(result.ok).toBe(false);
    expect(result.error?.kind).toBe("IOFailure");
  });

  it("runs from the backup script", () => {
    saveRecords(seededStore(), testConfig(dir));
    expect(runBackup(testConfig(dir))).toBe(true);
    expect(fs.readdirSync(dir).filter((name) => name.startsWith("backup_"))).toHaveLength(1);
  });
});
