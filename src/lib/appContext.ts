// src/lib/appContext.ts
import type { AppConfig } from "../config/config";
import { RecordStore } from "./recordStore";

// Everything a route needs, built once at startup and handed down.
export interface AppContext {
  config: AppConfig;
  store: RecordStore;
}

export function createAppContext(config: AppConfig, store = new RecordStore()): AppContext {
  return { config, store };
}
