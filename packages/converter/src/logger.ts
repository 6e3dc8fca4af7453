/**
 * Minimal logging seam. The default logger writes `[tag] message` lines
 * through `console`; callers may pass their own implementation.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Readonly<Record<string, string | number | boolean | undefined>>;

export interface ConverterLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Default tag used as the log line prefix */
export const DEFAULT_LOG_TAG = "graphwire";

function formatLine(tag: string, message: string, context?: LogContext): string {
  if (!context) {
    return `[${tag}] ${message}`;
  }
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return pairs.length > 0 ? `[${tag}] ${message} (${pairs.join(", ")})` : `[${tag}] ${message}`;
}

/**
 * Create a console-backed logger.
 *
 * @param tag - Log line prefix
 * @param minLevel - Lines below this level are dropped (default "info")
 */
export function createConsoleLogger(
  tag: string = DEFAULT_LOG_TAG,
  minLevel: LogLevel = "info",
): ConverterLogger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug(message, context) {
      if (enabled("debug")) console.debug(formatLine(tag, message, context));
    },
    info(message, context) {
      if (enabled("info")) console.info(formatLine(tag, message, context));
    },
    warn(message, context) {
      if (enabled("warn")) console.warn(formatLine(tag, message, context));
    },
    error(message, context) {
      if (enabled("error")) console.error(formatLine(tag, message, context));
    },
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: ConverterLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Structural check used by option validation.
 */
export function isConverterLogger(value: unknown): value is ConverterLogger {
  if (value === null || typeof value !== "object") {
    return false;
  }
  return (
    "debug" in value &&
    typeof value.debug === "function" &&
    "info" in value &&
    typeof value.info === "function" &&
    "warn" in value &&
    typeof value.warn === "function" &&
    "error" in value &&
    typeof value.error === "function"
  );
}
