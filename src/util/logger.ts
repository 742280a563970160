import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isProduction, isTest } from "./env";

/**
 * Structured logger for the analysis pipeline and CLI.
 * Logs go to stderr so that stdout carries only the rendered report.
 * - Local/dev: pretty-printed
 * - Production: JSON lines
 * - Tests: silent unless LOG_LEVEL is set
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const options: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "auto-report-scorer",
    stage: getStage(),
  },
  redact: {
    // provider and tracing credentials
    paths: [
      "*.apiKey",
      "*.token",
      "*.secretKey",
      "*.publicKey",
      "*.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

function createRootLogger(): Logger {
  if (isProduction() || isTest()) {
    return pino(options, pino.destination(2));
  }
  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,service,stage",
        messageKey: "message",
      },
    },
  });
}

const rootLogger: Logger = createRootLogger();

export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Child logger bound to one analysis run, so every line of a track carries
 * its run id and rubric version.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: { runId: string; track?: string; rubricVersion?: string }
): Logger {
  return getLogger(moduleName).child(run);
}

export default rootLogger;
