// src/scripts/createBackup.ts
import { AppConfig, loadConfig } from "../config/config";
import { createBackup } from "../services/backupService";

export const runBackup = (config: Pick<AppConfig, "dataDir">) => {
  const result = createBackup(config);
  if (result.skipped.length > 0) {
    console.log(`Skipped missing files: ${result.skipped.join(", ")}`);
  }
  return result.ok;
};

if (require.main === module) {
  process.exit(runBackup(loadConfig()) ? 0 : 1);
}
