// ---------------------------------------------------------------------------
// Logging – tslog root logger plus per-module child loggers
// ---------------------------------------------------------------------------
// Components never hold a logger themselves; they receive plain log
// functions at construction (see LogFns) so tests can record output.
// ---------------------------------------------------------------------------

import { Logger, type ILogObj } from "tslog";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = "pretty" | "json" | "hidden";

export type LogFns = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

let rootLogger: Logger<ILogObj> = createRootLogger("info", "pretty");

function createRootLogger(level: LogLevel, format: LogFormat): Logger<ILogObj> {
  return new Logger<ILogObj>({
    name: "lanpull",
    type: format,
    minLevel: LOG_LEVELS.indexOf(level),
  });
}

/**
 * Replace the root logger. Child loggers created before this call keep the
 * previous settings, so configure logging before building the gateway.
 */
export function configureLogging(opts: { level?: LogLevel; format?: LogFormat }): void {
  rootLogger = createRootLogger(opts.level ?? "info", opts.format ?? "pretty");
}

export function getChildLogger(bindings: { module: string }): Logger<ILogObj> {
  return rootLogger.getSubLogger({ name: bindings.module });
}

export function toLogFns(logger: Logger<ILogObj>): LogFns {
  return {
    debug: (msg) => logger.debug(msg),
    info: (msg) => logger.info(msg),
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
  };
}
