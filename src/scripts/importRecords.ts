// src/scripts/importRecords.ts
// Usage: node dist/scripts/importRecords.js <students|courses> <file.csv>
import fs from "fs";
import { AppConfig, loadConfig } from "../config/config";
import { RecordStore } from "../lib/recordStore";
import { loadRecords, saveRecords } from "../services/recordsPersistence";
import { importCourses, importStudents, ImportResult } from "../services/recordsImporter";

export type ImportKind = "students" | "courses";

export const isImportKind = (value: string | undefined): value is ImportKind =>
  value === "students" || value === "courses";

/** Loads the data directory, applies the import, saves it back. */
export const runImport = (
  kind: ImportKind,
  filePath: string,
  config: Pick<AppConfig, "dataDir">
): ImportResult => {
  const store = new RecordStore();
  const loaded = loadRecords(store, config);
  if (!loaded.ok) throw new Error(`Cannot import into unreadable data: ${loaded.error?.message}`);

  const text = fs.readFileSync(filePath, "utf-8");
  const result = kind === "students" ? importStudents(store, text) : importCourses(store, text);

  result.errors.forEach((e) => console.error(`❌ ${e}`));
  result.warnings.forEach((w) => console.warn(`⚠️ ${w}`));
  console.log(`📥 Imported ${result.success}/${result.total} ${kind}`);

  if (result.success > 0) {
    const saved = saveRecords(store, config);
    if (!saved.ok) throw new Error(`Import not saved: ${saved.error?.message}`);
  }
  return result;
};

if (require.main === module) {
  const [kind, filePath] = process.argv.slice(2);
  if (!isImportKind(kind) || !filePath) {
    console.error("Usage: importRecords <students|courses> <file.csv>");
    process.exit(1);
  }
  try {
    runImport(kind, filePath, loadConfig());
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
}
