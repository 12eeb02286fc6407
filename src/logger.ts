/**
 * Global Logger Module
 * Provides centralized console logging with a LOG_LEVEL threshold
 */

export type LogLevel = "error" | "warning" | "info" | "debug";

export interface LogOptions {
  source?: string;
  context?: Record<string, unknown>;
  skipConsole?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warning: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Reads the active threshold on every call so tests can change LOG_LEVEL
 */
export function getLogLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || "").toLowerCase();
  return isLogLevel(configured) ? configured : "info";
}

/**
 * Get the calling file name from stack trace
 * `depth` is the number of frames between this function and the caller
 */
function getCallerInfo(depth: number): string {
  const stack = new Error().stack;
  if (!stack) return "unknown";

  const lines = stack.split("\n");
  // First line is the "Error" header
  const callerLine = lines[depth + 1] || "";

  const match = callerLine.match(/at\s+(?:.*\s+)?\(?(.*):(\d+):(\d+)\)?/);
  if (match) {
    const fullPath = match[1];
    const fileName = fullPath.split("/").pop() || fullPath;
    return fileName.replace(".ts", "").replace(".js", "");
  }

  return "unknown";
}

/**
 * Builds the single console line for an entry
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  source?: string,
  context?: Record<string, unknown>
): string {
  const prefix = `[${level.toUpperCase()}]`;
  const sourceInfo = source ? ` [${source}]` : "";
  const contextInfo = context ? ` ${JSON.stringify(context)}` : "";
  return `${prefix}${sourceInfo} ${message}${contextInfo}`;
}

/**
 * Core logging function
 */
function log(level: LogLevel, message: string, options?: LogOptions): void {
  if (options?.skipConsole) return;
  if (LEVEL_ORDER[level] > LEVEL_ORDER[getLogLevel()]) return;

  // log <- logger method <- caller
  const source = options?.source || getCallerInfo(3);
  const line = formatLogLine(level, message, source, options?.context);

  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warning":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
}

/**
 * Global logger instance with convenience methods
 */
export const logger = {
  error(message: string, options?: LogOptions): void {
    log("error", message, options);
  },

  warning(message: string, options?: LogOptions): void {
    log("warning", message, options);
  },

  info(message: string, options?: LogOptions): void {
    log("info", message, options);
  },

  debug(message: string, options?: LogOptions): void {
    log("debug", message, options);
  },

  /**
   * Log an error from an Error object, including its cause chain
   */
  errorFromException(error: unknown, options?: LogOptions): void {
    if (options?.skipConsole) return;

    const message = error instanceof Error ? error.message : String(error);
    const source = options?.source || getCallerInfo(2);
    console.error(formatLogLine("error", message, source, options?.context));

    if (getLogLevel() !== "debug") return;

    let current: unknown = error;
    while (current instanceof Error) {
      if (current.stack) {
        console.error(current.stack);
      }
      current = current.cause;
    }
  },
};

export default logger;
