// packages/common/src/logger.ts
import { stableStringify } from "./stable-json.js";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export type LogFields = Record<string, unknown>;

export type Logger = {
  readonly level: LogLevel;
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
};

/** Anything with console's shape; tests pass a recorder. */
export type LogSink = {
  error(line: string): void;
  warn(line: string): void;
  info(line: string): void;
  debug(line: string): void;
};

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

function format(scope: string, message: string, fields?: LogFields): string {
  const head = `[${scope}] ${message}`;
  if (!fields || Object.keys(fields).length === 0) return head;
  return `${head} ${stableStringify(fields)}`;
}

export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = console): Logger {
  const enabled = (l: Exclude<LogLevel, "silent">) => RANK[level] >= RANK[l];

  return {
    level,
    error: (m, f) => {
      if (enabled("error")) sink.error(format(scope, m, f));
    },
    warn: (m, f) => {
      if (enabled("warn")) sink.warn(format(scope, m, f));
    },
    info: (m, f) => {
      if (enabled("info")) sink.info(format(scope, m, f));
    },
    debug: (m, f) => {
      if (enabled("debug")) sink.debug(format(scope, m, f));
    },
    child: (sub) => createLogger(`${scope}:${sub}`, level, sink),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
