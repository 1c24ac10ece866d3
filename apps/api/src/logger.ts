import pino, { type Logger } from "pino";
import type { LogLevel } from "./config";

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

// ─── Logger ───────────────────────────────────────────────
// Pino is async and JSON structured; pretty output only for local work
export const createLogger = ({ level, pretty }: LoggerOptions): Logger =>
  pino({
    level,
    transport: pretty
      ? { target: "pino-pretty" } // dev: human readable
      : undefined, // prod: raw JSON for log aggregators
  });
