// src/config/logger.ts
import pino from "pino";

export type AppLogger = pino.Logger;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger JSON (pino). Sólo diagnóstico: nada del contrato depende de lo que se loguea.
 */
export function createLogger(level: LogLevel = "info", env = "development"): AppLogger {
  return pino({
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: "catalogo-productos",
      env,
    },
  });
}
