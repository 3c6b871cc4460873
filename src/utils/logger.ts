import color from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.cyan,
  warn: color.yellow,
  error: color.red,
};

export const LOG_LEVEL_ENV = "HOMESTASH_LOG_LEVEL";

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/**
 * Level named by the environment, falling back to info
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : "info";
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

/**
 * `[timestamp] LEVEL [scope] message data`; the scope is omitted for the root logger
 */
export function formatMessage(level: LogLevel, message: string, data?: unknown, scope?: string): string {
  const header = LEVEL_COLORS[level](`[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)}`);
  const prefix = scope ? `${color.dim(`[${scope}]`)} ` : "";
  const suffix = data === undefined ? "" : ` ${formatData(data)}`;
  return `${header} ${prefix}${message}${suffix}`;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Narrate the start of a pipeline step; the last one printed marks where an aborted run stopped */
  step(message: string): void;
  /** Logger whose lines carry `scope`, nested as "parent:child" */
  child(scope: string): Logger;
}

/**
 * Loggers share the process-wide level; only their scope differs
 */
export function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (!shouldLog(level)) {
      return;
    }
    const line = formatMessage(level, message, data, scope);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    step: (message) => write("info", `==> ${message}`),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger = createLogger();
