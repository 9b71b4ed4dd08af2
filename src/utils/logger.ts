import { Logger } from "tslog";
import type { ILogObj } from "tslog";

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(): number {
  const requested = process.env.LOG_LEVEL?.toLowerCase() ?? "info";
  return LEVELS[requested] ?? LEVELS.info;
}

export const logger: Logger<ILogObj> = new Logger({
  name: "mmsearch",
  minLevel: resolveMinLevel(),
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  // stdout carries the MCP stdio protocol and CLI results.
  overwrite: {
    transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
      console.error(logMetaMarkup, ...logArgs, ...logErrors);
    },
  },
});

export type AppLogger = Logger<ILogObj>;

export function createLogger(name: string): AppLogger {
  return logger.getSubLogger({ name });
}
