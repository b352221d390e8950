// src/server.ts
import { createApp } from "./app";
import { loadConfig } from "./config/config";
import { createAppContext } from "./lib/appContext";
import { loadRecords, saveRecords } from "./services/recordsPersistence";

const config = loadConfig();
const context = createAppContext(config);

const startServer = () => {
  // 1. Load flat files (missing files mean an empty store)
  const report = loadRecords(context.store, config);
  if (!report.ok) console.error("⚠️ Starting with partial data:", report.error?.message);

  // 2. Listen
  const app = createApp(context);
  const server = app.listen(config.port, () => {
    console.log(`${config.appName} running on http://localhost:${config.port}`);
    console.log(`Data directory: ${config.dataDir}`);
  });

  // 3. Final save on exit
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`${signal} received, saving records...`);
    saveRecords(context.store, config);
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

startServer();
