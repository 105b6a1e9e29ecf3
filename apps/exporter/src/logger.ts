import pino from "pino";

// Pretty print outside production and tests
const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.VITEST !== undefined;
const transport = isProduction || isTest
  ? undefined
  : {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname",
        translateTime: "SYS:standard",
      },
    };

/**
 * Exporter logger.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport,
});

export type { Logger } from "pino";
