/**
 * Structured Logger
 *
 * Writes to stderr so that stdout stays free for whatever embeds the engine.
 *
 * - Levels: debug, info, warn, error (LOG_LEVEL, default info)
 * - LOG_FORMAT=json switches to one JSON object per line
 * - Child loggers carry a fixed context such as { component: "pipeline" }
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  time<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// ============================================================================
// Configuration
// ============================================================================

function currentLevel(): LogLevel {
  const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : "info";
}

function jsonOutput(): boolean {
  return process.env["LOG_FORMAT"] === "json";
}

// ============================================================================
// Core
// ============================================================================

export function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const hasContext = context !== undefined && Object.keys(context).length > 0;

  if (jsonOutput()) {
    const entry: LogEntry = { level, message, timestamp, ...(hasContext ? { context } : {}) };
    console.error(JSON.stringify(entry));
    return;
  }

  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  if (hasContext) {
    console.error(`${prefix} ${message}`, context);
  } else {
    console.error(`${prefix} ${message}`);
  }
}

function createLogger(base: LogContext): Logger {
  const withBase = (context?: LogContext): LogContext => ({ ...base, ...context });

  return {
    debug: (message, context) => log("debug", message, withBase(context)),
    info: (message, context) => log("info", message, withBase(context)),
    warn: (message, context) => log("warn", message, withBase(context)),
    error: (message, context) => log("error", message, withBase(context)),
    child: (context) => createLogger(withBase(context)),

    async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
      const start = Date.now();
      try {
        const result = await fn();
        log("debug", `${label} completed`, withBase({ durationMs: Date.now() - start }));
        return result;
      } catch (error) {
        log(
          "error",
          `${label} failed`,
          withBase({
            durationMs: Date.now() - start,
            error: error instanceof Error ? error.message : String(error),
          })
        );
        throw error;
      }
    },
  };
}

/**
 * Root logger.
 *
 * @example
 * ```ts
 * const pipelineLog = logger.child({ component: "pipeline" });
 * pipelineLog.warn("Detector timed out", { detector: "reentrancy" });
 * ```
 */
export const logger: Logger = createLogger({});
