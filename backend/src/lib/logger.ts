import pino from "pino";
import type { Logger } from "pino";

export type Log = Pick<Logger, "debug" | "info" | "warn" | "error">;

export const createLogger = (level = process.env.LOG_LEVEL || "info"): Logger =>
  pino({ level, base: { service: "media-backend" } });

export const logger = createLogger();
