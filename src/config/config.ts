// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

export interface AppConfig {
  readonly port: number;
  readonly dataDir: string;
  readonly maxCreditsPerSemester: number;
  readonly appName: string;
}

export const DEFAULT_MAX_CREDITS = 20;

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    port: positiveInt(env.PORT, 3000),
    dataDir: env.DATA_DIR || "data",
    maxCreditsPerSemester: positiveInt(env.MAX_CREDITS, DEFAULT_MAX_CREDITS),
    appName: env.APP_NAME || "Campus Course & Records Manager",
  });
}
