/**
 * Utility Exports
 */

export { logger, type Logger, type LogLevel, type LogContext, type LogEntry } from "./logger.js";
export {
  SEVERITY_ORDER,
  SEVERITY_PENALTY,
  compareSeverity,
  countBySeverity,
  downgradeSeverity,
  maxSeverity,
  meetsSeverityFloor,
  sortBySeverity,
  type SeverityCounts,
} from "./severity.js";
export { runWithConcurrency } from "./concurrency.js";
