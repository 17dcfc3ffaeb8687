// src/config/env.ts
import dotenv from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  // ruta del archivo SQLite o ":memory:"
  DATABASE_URI: z.string().min(1).default("products.db"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type AppConfig = {
  env: "development" | "test" | "production";
  databaseUri: string;
  logLevel: LogLevel;
};

/** Carga .env (si existe) en process.env; no pisa variables ya definidas. */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Configuración inválida: ${detail}`);
  }
  return {
    env: parsed.data.NODE_ENV,
    databaseUri: parsed.data.DATABASE_URI,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
