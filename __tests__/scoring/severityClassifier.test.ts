/**
 * Severity Classifier Tests
 *
 * Tests for turning raw detector output into catalog-backed findings
 * using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import { RULE_CATALOG, catalogRules, getRule } from "../../src/scoring/ruleCatalog.js";
import {
  buildRuleIndex,
  classifyFinding,
  classifyFindings,
  findingId,
} from "../../src/scoring/severityClassifier.js";
import { Severity, type Detector, type RawFinding, type RuleDefinition } from "../../src/types/index.js";

const location = { file: "src/lib.rs", line: 12, column: 9, function: "withdraw" };

function raw(overrides: Partial<RawFinding> = {}): RawFinding {
  return { ruleId: "SEC-001", location, description: "External call before write", ...overrides };
}

function detectorWith(rules: RuleDefinition[]): Detector {
  return {
    id: "custom",
    name: "Custom",
    description: "Custom rules",
    category: "security",
    rules,
    inspect: () => [],
  };
}

// ============================================================================
// Rule catalog
// ============================================================================

describe("rule catalog", () => {
  it("should cover every category with unique ids", () => {
    // Given: The built-in catalog
    const rules = [...RULE_CATALOG.values()];

    // Then: Each id appears once and each category is represented
    expect(new Set(rules.map((rule) => rule.id)).size).toBe(rules.length);
    expect(new Set(rules.map((rule) => rule.category))).toEqual(new Set(["security", "performance", "quality"]));
    expect(getRule("SEC-001")?.severity).toBe(Severity.CRITICAL);
  });

  it("should reject unknown ids when resolving detector rules", () => {
    expect(() => catalogRules("SEC-001", "NOPE-1")).toThrow("Unknown rule id: NOPE-1");
  });
});

// ============================================================================
// Single finding
// ============================================================================

describe("classifyFinding", () => {
  const rule = RULE_CATALOG.get("SEC-001");

  it("should take severity, title and recommendation from the rule", () => {
    // Given: A full reentrancy match
    if (rule === undefined) throw new Error("SEC-001 missing");

    // When: Classifying
    const finding = classifyFinding(raw(), rule, "reentrancy");

    // Then: Catalog values, deterministic id
    expect(finding).toEqual({
      id: "SEC-001:src/lib.rs:12:9",
      ruleId: "SEC-001",
      title: "Reentrancy Pattern",
      category: "security",
      severity: Severity.CRITICAL,
      confidence: "high",
      match: "full",
      description: "External call before write",
      location,
      recommendation: rule.recommendation,
      detector: "reentrancy",
      swcId: "SWC-107",
    });
  });

  it("should downgrade partial matches one level", () => {
    // Given: A partial match of a critical rule
    if (rule === undefined) throw new Error("SEC-001 missing");

    // When: Classifying
    const finding = classifyFinding(raw({ match: "partial" }), rule, "reentrancy");

    // Then: High, medium confidence by default
    expect(finding.severity).toBe(Severity.HIGH);
    expect(finding.confidence).toBe("medium");
  });

  it("should keep informational partial matches informational", () => {
    // Given: QA-001 is already the lowest level
    const docs = RULE_CATALOG.get("QA-001");
    if (docs === undefined) throw new Error("QA-001 missing");

    // When: Classifying a partial match
    const finding = classifyFinding(raw({ ruleId: "QA-001", match: "partial" }), docs, "documentation");

    // Then: Still informational
    expect(finding.severity).toBe(Severity.INFORMATIONAL);
  });

  it("should round gas savings and never report them negative", () => {
    // Given: Fractional and negative savings
    const gasRule = RULE_CATALOG.get("GAS-002");
    if (gasRule === undefined) throw new Error("GAS-002 missing");

    // When: Classifying
    const rounded = classifyFinding(raw({ ruleId: "GAS-002", estimatedGasSavings: 99.6 }), gasRule, "storage");
    const negative = classifyFinding(raw({ ruleId: "GAS-002", estimatedGasSavings: -5 }), gasRule, "storage");

    // Then: Whole, non-negative gas
    expect(rounded.estimatedGasSavings).toBe(100);
    expect(negative.estimatedGasSavings).toBe(0);
    expect(rounded.swcId).toBeUndefined();
  });
});

// ============================================================================
// Batches
// ============================================================================

describe("classifyFindings", () => {
  it("should drop unknown rules with a diagnostic and disabled rules silently", () => {
    // Given: A known, an unknown and a disabled rule
    const input = [
      { detector: "reentrancy", finding: raw() },
      { detector: "custom", finding: raw({ ruleId: "CUSTOM-9" }) },
      { detector: "environment", finding: raw({ ruleId: "SEC-007" }) },
    ];

    // When: Classifying with SEC-007 disabled
    const result = classifyFindings(input, RULE_CATALOG, ["SEC-007"]);

    // Then: One finding, one diagnostic
    expect(result.findings.map((finding) => finding.ruleId)).toEqual(["SEC-001"]);
    expect(result.diagnostics).toEqual([
      {
        code: "UNKNOWN_RULE",
        message: "Detector custom reported unknown rule 'CUSTOM-9'",
        location,
        detector: "custom",
      },
    ]);
  });
});

describe("buildRuleIndex", () => {
  it("should add detector-declared rules but keep built-in ones", () => {
    // Given: A detector declaring a new rule and a clashing one
    const detector = detectorWith([
      { id: "CUSTOM-1", title: "Custom", category: "security", severity: Severity.LOW, recommendation: "Review" },
      { id: "SEC-001", title: "Override", category: "security", severity: Severity.LOW, recommendation: "Ignore" },
    ]);

    // When: Building the index
    const index = buildRuleIndex([detector]);

    // Then: New rule added, catalog entry unchanged
    expect(index.get("CUSTOM-1")?.severity).toBe(Severity.LOW);
    expect(index.get("SEC-001")?.title).toBe("Reentrancy Pattern");
    expect(index.size).toBe(RULE_CATALOG.size + 1);
  });
});

describe("findingId", () => {
  it("should combine rule and position", () => {
    expect(findingId({ ruleId: "GAS-004", location: { file: "a.sol", line: 3, column: 7 } })).toBe("GAS-004:a.sol:3:7");
  });
});
