/**
 * Subsystem loggers.
 *
 * Every line is `<ISO timestamp> - <LEVEL> - [<subsystem>] <message>`, with
 * structured metadata appended as JSON when given.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

export type SubsystemLogger = {
  readonly subsystem: string;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (name: string) => SubsystemLogger;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

let activeLevel: LogLevel = resolveLogLevel(process.env);
let activeSink: LogSink = consoleSink;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

/** Redirect output (tests); pass nothing to restore the console. */
export function setLogSink(sink?: LogSink): void {
  activeSink = sink ?? consoleSink;
}

export function formatLogLine(
  level: LogLevel,
  subsystem: string,
  message: string,
  meta?: LogMeta,
  now: Date = new Date(),
): string {
  const base = `${now.toISOString()} - ${level.toUpperCase()} - [${subsystem}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
    activeSink(level, formatLogLine(level, subsystem, message, meta));
  };

  return {
    subsystem,
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
