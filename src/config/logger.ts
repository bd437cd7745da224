import { pino } from "pino";

export type { Logger } from "pino";

const defaultLevel = process.env.NODE_ENV === "test" ? "silent" : "info";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel,
  base: { service: "social-post-dispatcher" },
  timestamp: pino.stdTimeFunctions.isoTime
});
