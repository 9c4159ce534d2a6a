import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger shared by blocks and renderers.
 * - Local/dev: pretty-printed logs for readability
 * - Hosted runs: JSON logs the workflow host can collect
 * - Tests: silent unless LOG_LEVEL is set
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

export const loggerOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "fundamental-report-blocks",
    stage: getStage(),
  },
  redact: {
    // Remove credentials from logs
    paths: [
      "apiKey",
      "api_key",
      "*.apiKey",
      "*.api_key",
      "*.token",
      "*.secret",
      "headers.Authorization",
      "headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...loggerOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger carrying the host's invocation fields.
 * Use inside block handlers when the host passes a context.
 */
export function withBlockContext(
  moduleName: string | undefined,
  context: {
    invocationId?: string;
    blockName?: string;
    flowId?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    invocationId: context.invocationId,
    blockName: context.blockName,
    flowId: context.flowId,
  });
}

export default rootLogger;
