/**
 * Scorer and Quality Metric Tests
 *
 * Using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import {
  errorHandlingCoverage,
  functionQuality,
  riskyArithmetic,
  summarizeQuality,
} from "../../src/scoring/quality.js";
import { RISK_DENSITY_THRESHOLD, assessRisk, scoreCategories } from "../../src/scoring/scorer.js";
import { Severity, type QualitySummary } from "../../src/types/index.js";
import { makeFinding } from "../helpers/findings.js";
import { makeContract, makeFunction, opsFor, withArms } from "../helpers/models.js";

const quality = (score: number): QualitySummary => ({
  score,
  documentationCoverage: 1,
  averageComplexity: 1,
  functions: [],
});

// ============================================================================
// Category scores
// ============================================================================

describe("scoreCategories", () => {
  it("should subtract severity penalties per category", () => {
    // Given: Critical and high security findings, one medium performance finding
    const findings = [
      makeFinding({ severity: Severity.CRITICAL }),
      makeFinding({ severity: Severity.HIGH, location: { line: 2 } }),
      makeFinding({ ruleId: "GAS-005", category: "performance", severity: Severity.MEDIUM }),
    ];

    // When: Scoring
    const scores = scoreCategories(findings, quality(73), 3);

    // Then: 100-40-20, 100-10, and the quality summary
    expect(scores).toEqual({ security: 40, performance: 90, quality: 73 });
  });

  it("should clamp at zero", () => {
    // Given: Three critical findings
    const findings = [1, 2, 3].map((line) => makeFinding({ severity: Severity.CRITICAL, location: { line } }));

    // When/Then: Never negative
    expect(scoreCategories(findings, quality(50), 1).security).toBe(0);
  });

  it("should score an empty contract as zero", () => {
    expect(scoreCategories([], quality(0), 0)).toEqual({ security: 0, performance: 0, quality: 0 });
  });

  it("should give a clean contract full marks", () => {
    expect(scoreCategories([], quality(100), 2)).toEqual({ security: 100, performance: 100, quality: 100 });
  });
});

// ============================================================================
// Risk
// ============================================================================

describe("assessRisk", () => {
  it("should follow the most severe finding", () => {
    // Given: A medium and a low finding over four functions
    const findings = [makeFinding({ severity: Severity.MEDIUM }), makeFinding({ severity: Severity.LOW })];

    // When/Then: Medium
    expect(assessRisk(findings, 4)).toBe("medium");
  });

  it("should report no risk for informational findings or empty contracts", () => {
    expect(assessRisk([makeFinding({ severity: Severity.INFORMATIONAL })], 1)).toBe("none");
    expect(assessRisk([makeFinding({ severity: Severity.CRITICAL })], 0)).toBe("none");
    expect(assessRisk([], 3)).toBe("none");
  });

  it("should escalate one level when findings are dense", () => {
    // Given: Four low findings over two functions (density 2)
    const dense = [1, 2, 3, 4].map((line) => makeFinding({ severity: Severity.LOW, location: { line } }));
    const sparse = dense.slice(0, 3);

    // When/Then: Dense escalates to medium, sparse stays low
    expect(RISK_DENSITY_THRESHOLD).toBe(2);
    expect(assessRisk(dense, 2)).toBe("medium");
    expect(assessRisk(sparse, 2)).toBe("low");
  });

  it("should not count informational findings toward density", () => {
    // Given: One high finding and three informational ones in one function
    const findings = [
      makeFinding({ severity: Severity.HIGH }),
      ...[2, 3, 4].map((line) => makeFinding({ severity: Severity.INFORMATIONAL, location: { line } })),
    ];

    // When/Then: Density 1, no escalation
    expect(assessRisk(findings, 1)).toBe("high");
  });
});

// ============================================================================
// Quality metrics
// ============================================================================

describe("functionQuality", () => {
  it("should award full points to a documented, simple, fully handled function", () => {
    // Given: Documented straight-line code with nothing fallible
    const op = opsFor("get");
    const fn = makeFunction({ name: "get", documentation: "Read x.", operations: [op.read("x")] });

    // When/Then: 40 + 30 + 30
    expect(functionQuality(fn, 10)).toEqual({
      function: "get",
      score: 100,
      documented: true,
      complexity: 1,
      errorHandling: 1,
    });
  });

  it("should score documented functions above undocumented ones", () => {
    // Given: The same body with and without docs
    const op = opsFor("get");
    const body = [op.read("x")];
    const documented = makeFunction({ name: "get", documentation: "Read x.", operations: body });
    const bare = makeFunction({ name: "get", operations: body });

    // When/Then: 100 against 60
    expect(functionQuality(documented, 10).score).toBeGreaterThan(functionQuality(bare, 10).score);
    expect(functionQuality(bare, 10).score).toBe(60);
  });

  it("should weigh error handling coverage and complexity", () => {
    // Given: One checked and one unchecked call inside a two-armed branch
    const op = opsFor("sync");
    const branch = op.branch();
    const fn = makeFunction({
      name: "sync",
      operations: [withArms(branch, [[op.call()], [op.call({ resultChecked: false })]])],
    });

    // When: Threshold 1, complexity 2
    const score = functionQuality(fn, 1);

    // Then: 0 + (30 - 3) + round(30 x 0.5)
    expect(score).toEqual({ function: "sync", score: 42, documented: false, complexity: 2, errorHandling: 0.5 });
  });
});

describe("errorHandlingCoverage and riskyArithmetic", () => {
  it("should count arithmetic behind a validation guard as handled", () => {
    // Given: An unchecked addition after a validation guard
    const op = opsFor("deposit");
    const guarded = makeFunction({ name: "deposit", operations: [op.guard("validation"), op.arith()] });
    const bare = makeFunction({ name: "deposit", operations: [op.arith()] });

    // When/Then: Fully versus not handled
    expect(errorHandlingCoverage(guarded)).toBe(1);
    expect(errorHandlingCoverage(bare)).toBe(0);
  });

  it("should only treat overflowing operators on balances and indices as risky", () => {
    // Given: A mix of arithmetic
    const op = opsFor("calc");
    const fn = makeFunction({
      name: "calc",
      operations: [
        op.arith({ operator: "*" }),
        op.arith({ operator: "%" }),
        op.arith({ checked: true }),
        op.arith({ usage: "value" }),
      ],
    });

    // When/Then: Only the multiplication
    expect(riskyArithmetic(fn).map((arith) => arith.operator)).toEqual(["*"]);
  });
});

describe("summarizeQuality", () => {
  it("should average function scores and coverage", () => {
    // Given: One documented and one undocumented function
    const model = makeContract([
      makeFunction({ name: "a", documentation: "Docs." }),
      makeFunction({ name: "b" }),
    ]);

    // When: Summarizing
    const summary = summarizeQuality(model, 10);

    // Then: (100 + 60) / 2
    expect(summary.score).toBe(80);
    expect(summary.documentationCoverage).toBe(0.5);
    expect(summary.averageComplexity).toBe(1);
    expect(summary.functions.map((fn) => fn.function)).toEqual(["a", "b"]);
  });

  it("should return zeros for a contract without functions", () => {
    expect(summarizeQuality(makeContract([]), 10)).toEqual({
      score: 0,
      documentationCoverage: 0,
      averageComplexity: 0,
      functions: [],
    });
  });
});
