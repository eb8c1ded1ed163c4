import { pino } from "pino";

/** The subset of a pino logger the handlers write to. */
export interface RequestLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}

export const logger = pino({
  name: "pdf-metadata",
  level: process.env.LOG_LEVEL || "info",
});
