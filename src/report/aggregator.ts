/**
 * Report Aggregator
 *
 * Merges classified findings into the final report: duplicates removed,
 * correlations annotated, the severity floor applied and a total order
 * imposed so that identical inputs give identical reports.
 */

import type { AnalysisOptions } from "../config/schema.js";
import {
  type Category,
  type ContractModel,
  type CostReport,
  type Diagnostic,
  type Finding,
  type QualitySummary,
  type Report,
  type ReportSummary,
} from "../types/index.js";
import { compareSeverity, countBySeverity, meetsSeverityFloor } from "../utils/severity.js";
import { assessRisk, scoreCategories } from "../scoring/scorer.js";
import { correlateFindings } from "./correlation.js";

export interface AggregationInput {
  model: ContractModel;
  /** Every classified finding, before deduplication and filtering */
  findings: readonly Finding[];
  costs: CostReport;
  quality: QualitySummary;
  /** Builder, pipeline and classifier diagnostics, in that order */
  diagnostics: readonly Diagnostic[];
  detectorsRun: readonly string[];
  config: Pick<AnalysisOptions, "severityFloor">;
}

// ============================================================================
// Ordering and deduplication
// ============================================================================

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Severity (most severe first), then file, line, column, then rule id. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareSeverity(a.severity, b.severity) ||
    compareText(a.location.file, b.location.file) ||
    a.location.line - b.location.line ||
    a.location.column - b.location.column ||
    compareText(a.ruleId, b.ruleId)
  );
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

/** Keep the first finding per rule and location. */
export function deduplicateFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  return findings.filter((finding) => {
    const key = `${finding.ruleId}:${finding.location.file}:${finding.location.line}:${finding.location.column}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// ============================================================================
// Summary
// ============================================================================

function summarize(listed: readonly Finding[], suppressed: number): ReportSummary {
  const byCategory: Record<Category, number> = { security: 0, performance: 0, quality: 0 };
  for (const finding of listed) {
    byCategory[finding.category] += 1;
  }
  return { ...countBySeverity(listed), byCategory, suppressed };
}

// ============================================================================
// Aggregation
// ============================================================================

export function aggregateReport(input: AggregationInput): Report {
  const { model } = input;
  const unique = correlateFindings(deduplicateFindings(input.findings));
  const listed = sortFindings(
    unique.filter((finding) => meetsSeverityFloor(finding.severity, input.config.severityFloor))
  );
  const functionCount = model.functions.length;

  return {
    contract: {
      name: model.name,
      file: model.file,
      dialect: model.dialect,
      functions: functionCount,
      storageSlots: model.storage.length,
      externalCalls: model.externalCalls.length,
    },
    findings: listed,
    summary: summarize(listed, unique.length - listed.length),
    scores: scoreCategories(unique, input.quality, functionCount),
    risk: assessRisk(unique, functionCount),
    costs: input.costs,
    quality: input.quality,
    diagnostics: [...input.diagnostics],
    detectorsRun: [...input.detectorsRun],
    partial: input.diagnostics.length > 0,
  };
}
