// src/services/backupService.ts
import fs from "fs";
import path from "path";
import type { AppConfig } from "../config/config";
import { describeError, RecordsError } from "../lib/result";
import { DATA_FILES } from "./recordsPersistence";

export interface BackupResult {
  ok: boolean;
  directory: string;
  copied: string[];
  skipped: string[];
  error?: RecordsError;
}

const pad = (n: number) => String(n).padStart(2, "0");

// Local time, e.g. backup_20261019_083512
export function backupDirName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `backup_${date}_${time}`;
}

export function createBackup(config: Pick<AppConfig, "dataDir">, now: Date = new Date()): BackupResult {
  const directory = path.join(config.dataDir, backupDirName(now));
  const result: BackupResult = { ok: true, directory, copied: [], skipped: [] };

  try {
    fs.mkdirSync(directory, { recursive: true });

    for (const file of DATA_FILES) {
      const source = path.join(config.dataDir, file);
      if (!fs.existsSync(source)) {
        result.skipped.push(file);
        continue;
      }
      fs.copyFileSync(source, path.join(directory, file));
      result.copied.push(file);
    }

    console.log(`✅ Backup created at ${path.resolve(directory)}`);
  } catch (err) {
    console.error("❌ Failed to create backup:", err);
    result.ok = false;
    result.error = { kind: "IOFailure", message: describeError(err) };
  }

  return result;
}
