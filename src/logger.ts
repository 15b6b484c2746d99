import pino from "pino";
import type { Logger } from "pino";
import { config } from "./config";

// Synchronous so lines logged right before process.exit reach the file
const destination = config.logFile
  ? pino.destination({ dest: config.logFile, mkdir: true, sync: true })
  : pino.destination(2);

export const logger: Logger = pino(
  {
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { app: "scoreline" },
  },
  destination
);

export type { Logger };

export function withSource(source: string): Logger {
  return logger.child({ source });
}
