/**
 * Severity Classifier
 *
 * Turns raw detector output into findings. Title, category, severity and
 * recommendation come from the rule catalog; a partial match is downgraded
 * one level.
 */

import type {
  Detector,
  Diagnostic,
  Finding,
  RawFinding,
  RuleDefinition,
} from "../types/index.js";
import { downgradeSeverity } from "../utils/severity.js";
import { RULE_CATALOG } from "./ruleCatalog.js";

export interface AttributedFinding {
  detector: string;
  finding: RawFinding;
}

export interface ClassificationResult {
  findings: Finding[];
  diagnostics: Diagnostic[];
}

/**
 * Rules known to the classifier: the built-in catalog plus rules declared by
 * supplied detectors. Built-in entries win on an id clash.
 */
export function buildRuleIndex(detectors: readonly Detector[]): ReadonlyMap<string, RuleDefinition> {
  const index = new Map(RULE_CATALOG);
  for (const detector of detectors) {
    for (const rule of detector.rules) {
      if (!index.has(rule.id)) index.set(rule.id, rule);
    }
  }
  return index;
}

export function findingId(raw: Pick<RawFinding, "ruleId" | "location">): string {
  const { file, line, column } = raw.location;
  return `${raw.ruleId}:${file}:${line}:${column}`;
}

export function classifyFinding(raw: RawFinding, rule: RuleDefinition, detector: string): Finding {
  const match = raw.match ?? "full";
  const finding: Finding = {
    id: findingId(raw),
    ruleId: rule.id,
    title: rule.title,
    category: rule.category,
    severity: match === "partial" ? downgradeSeverity(rule.severity) : rule.severity,
    confidence: raw.confidence ?? (match === "partial" ? "medium" : "high"),
    match,
    description: raw.description,
    location: raw.location,
    recommendation: rule.recommendation,
    detector,
  };
  if (raw.estimatedGasSavings !== undefined) {
    finding.estimatedGasSavings = Math.max(0, Math.round(raw.estimatedGasSavings));
  }
  if (rule.swcId !== undefined) {
    finding.swcId = rule.swcId;
  }
  return finding;
}

/**
 * Classify every raw finding. Findings naming an unknown rule are dropped
 * with an UNKNOWN_RULE diagnostic; disabled rules are dropped silently.
 */
export function classifyFindings(
  raw: readonly AttributedFinding[],
  rules: ReadonlyMap<string, RuleDefinition>,
  disabledRules: readonly string[] = []
): ClassificationResult {
  const disabled = new Set(disabledRules);
  const findings: Finding[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const { detector, finding } of raw) {
    if (disabled.has(finding.ruleId)) continue;
    const rule = rules.get(finding.ruleId);
    if (rule === undefined) {
      diagnostics.push({
        code: "UNKNOWN_RULE",
        message: `Detector ${detector} reported unknown rule '${finding.ruleId}'`,
        location: finding.location,
        detector,
      });
      continue;
    }
    findings.push(classifyFinding(finding, rule, detector));
  }

  return { findings, diagnostics };
}
