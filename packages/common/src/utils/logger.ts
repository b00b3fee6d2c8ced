// ============================================
// Structured Logger
// ============================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVEL_MAP[raw?.toUpperCase() ?? ""] ?? LogLevel.INFO;
}

// Amounts are bigint everywhere; JSON.stringify throws on them.
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/** JSON.stringify with bigints as decimal strings */
export function toJson(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

export function formatLogEntry(
  level: LogLevel,
  service: string,
  message: string,
  meta?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const entry = {
    timestamp: now.toISOString(),
    level: LOG_LEVEL_NAMES[level],
    service,
    message,
    ...meta,
  };
  return JSON.stringify(entry, bigintReplacer);
}

export function createLogger(service: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)) {
  function log(entryLevel: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (entryLevel < level) return;

    const output = formatLogEntry(entryLevel, service, message, meta);

    if (entryLevel >= LogLevel.ERROR) {
      console.error(output);
    } else if (entryLevel >= LogLevel.WARN) {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  return {
    debug: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.DEBUG, msg, meta),
    info: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.INFO, msg, meta),
    warn: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.WARN, msg, meta),
    error: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.ERROR, msg, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
