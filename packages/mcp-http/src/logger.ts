export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogSink = (line: string, level: LogLevel) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sink and level, nested scope: `[parent:child]`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(raw: string | undefined, dflt: LogLevel = "info"): LogLevel {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : dflt;
}

const consoleSink: LogSink = (line, level) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

/**
 * Line logger in the `[scope] message` format used across the servers.
 * Level defaults to LOG_LEVEL from the environment.
 */
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const sink = opts.sink ?? consoleSink;
  const emit = (lvl: LogLevel, message: string) => {
    if (RANK[lvl] < RANK[level]) return;
    sink(`[${scope}] ${message}`, lvl);
  };
  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    child: (sub) => createLogger(`${scope}:${sub}`, { level, sink }),
  };
}

/** Renders an unknown thrown value with its stack when there is one. */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.stack ?? `${e.name}: ${e.message}`;
  return String(e);
}
