/**
 * Scorer
 *
 * Category scores (0-100) and the overall risk level. Every classified
 * finding counts, including those the severity floor hides from the report.
 */

import { Severity, type CategoryScores, type Finding, type QualitySummary, type RiskLevel } from "../types/index.js";
import { maxSeverity, SEVERITY_PENALTY } from "../utils/severity.js";

const MAX_SCORE = 100;

/** Non-informational findings per function at which risk is escalated. */
export const RISK_DENSITY_THRESHOLD = 2;

const RISK_BY_SEVERITY: Record<Severity, RiskLevel> = {
  [Severity.CRITICAL]: "critical",
  [Severity.HIGH]: "high",
  [Severity.MEDIUM]: "medium",
  [Severity.LOW]: "low",
  [Severity.INFORMATIONAL]: "none",
};

const ESCALATION: Record<RiskLevel, RiskLevel> = {
  critical: "critical",
  high: "critical",
  medium: "high",
  low: "medium",
  none: "none",
};

function clamp(value: number): number {
  return Math.min(MAX_SCORE, Math.max(0, Math.round(value)));
}

function penaltyScore(findings: readonly Finding[]): number {
  const penalty = findings.reduce((sum, finding) => sum + SEVERITY_PENALTY[finding.severity], 0);
  return clamp(MAX_SCORE - penalty);
}

export function scoreCategories(
  findings: readonly Finding[],
  quality: QualitySummary,
  functionCount: number
): CategoryScores {
  if (functionCount === 0) {
    return { security: 0, performance: 0, quality: 0 };
  }
  return {
    security: penaltyScore(findings.filter((finding) => finding.category === "security")),
    performance: penaltyScore(findings.filter((finding) => finding.category === "performance")),
    quality: clamp(quality.score),
  };
}

export function assessRisk(findings: readonly Finding[], functionCount: number): RiskLevel {
  if (functionCount === 0) return "none";
  const worst = maxSeverity(findings.map((finding) => finding.severity));
  if (worst === undefined) return "none";

  const base = RISK_BY_SEVERITY[worst];
  const significant = findings.filter((finding) => finding.severity !== Severity.INFORMATIONAL).length;
  return significant / functionCount >= RISK_DENSITY_THRESHOLD ? ESCALATION[base] : base;
}
