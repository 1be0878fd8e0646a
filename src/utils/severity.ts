/**
 * Severity utilities
 *
 * Ordering, counting and score penalties shared by the classifier, scorer and
 * report aggregator.
 */

import { Severity } from "../types/index.js";

// ============================================================================
// Severity Order (for sorting)
// ============================================================================

/**
 * Numeric ordering for severity levels (lower = more severe)
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.CRITICAL]: 0,
  [Severity.HIGH]: 1,
  [Severity.MEDIUM]: 2,
  [Severity.LOW]: 3,
  [Severity.INFORMATIONAL]: 4,
};

const BY_RANK: readonly Severity[] = [
  Severity.CRITICAL,
  Severity.HIGH,
  Severity.MEDIUM,
  Severity.LOW,
  Severity.INFORMATIONAL,
];

/**
 * Compare two severities for sorting (most severe first)
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b];
}

/**
 * Sort by severity (most severe first). Stable, so ties keep input order.
 */
export function sortBySeverity<T extends { severity: Severity }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareSeverity(a.severity, b.severity));
}

/** One level less severe; informational stays informational. */
export function downgradeSeverity(severity: Severity): Severity {
  return BY_RANK[SEVERITY_ORDER[severity] + 1] ?? Severity.INFORMATIONAL;
}

/** True when `severity` is at least as severe as `floor`. */
export function meetsSeverityFloor(severity: Severity, floor: Severity): boolean {
  return SEVERITY_ORDER[severity] <= SEVERITY_ORDER[floor];
}

export function maxSeverity(severities: Iterable<Severity>): Severity | undefined {
  let worst: Severity | undefined;
  for (const severity of severities) {
    if (worst === undefined || compareSeverity(severity, worst) < 0) {
      worst = severity;
    }
  }
  return worst;
}

// ============================================================================
// Severity Counts
// ============================================================================

export interface SeverityCounts {
  total: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
  informational: number;
}

/**
 * Count items by severity level.
 */
export function countBySeverity<T extends { severity: Severity }>(
  items: readonly T[]
): SeverityCounts {
  const counts: SeverityCounts = {
    total: items.length,
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    informational: 0,
  };

  for (const item of items) {
    switch (item.severity) {
      case Severity.CRITICAL:
        counts.critical++;
        break;
      case Severity.HIGH:
        counts.high++;
        break;
      case Severity.MEDIUM:
        counts.medium++;
        break;
      case Severity.LOW:
        counts.low++;
        break;
      case Severity.INFORMATIONAL:
        counts.informational++;
        break;
    }
  }

  return counts;
}

// ============================================================================
// Score Penalties
// ============================================================================

/**
 * Points deducted from a 100-point category score per finding.
 */
export const SEVERITY_PENALTY: Record<Severity, number> = {
  [Severity.CRITICAL]: 40,
  [Severity.HIGH]: 20,
  [Severity.MEDIUM]: 10,
  [Severity.LOW]: 4,
  [Severity.INFORMATIONAL]: 1,
};
