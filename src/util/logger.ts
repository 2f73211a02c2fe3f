import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isProduction, isTest } from "./env";

/**
 * Centralized structured logger.
 * - Local/dev: pretty-printed logs for readability
 * - Production: JSON lines, suitable for cron mail or log shipping
 * - Tests: silent, no transport worker
 */
function defaultLevel(): string {
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || defaultLevel(),
  base: {
    service: "lme-copper-analysis",
    stage: getStage(),
  },
  redact: {
    paths: ["*.password", "*.secret", "*.token", "*.apiKey"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger bound to a single analysis run.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: { runId: string; start?: string; end?: string }
): Logger {
  return getLogger(moduleName).child({
    runId: run.runId,
    start: run.start,
    end: run.end,
  });
}

export default rootLogger;
