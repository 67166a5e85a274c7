export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** A logger that adds `bindings` to every line it writes. */
  child(bindings: LogData): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: LogData): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function merge(bindings: LogData, data?: LogData): LogData | undefined {
  if (Object.keys(bindings).length === 0) return data;
  return { ...bindings, ...data };
}

function createLogger(bindings: LogData): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", msg, merge(bindings, data)));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", msg, merge(bindings, data)));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", msg, merge(bindings, data)));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", msg, merge(bindings, data)));
    },
    child(extra) {
      return createLogger({ ...bindings, ...extra });
    },
  };
}

export const log: Logger = createLogger({});
