/**
 * Quality metrics
 *
 * Per-function quality score out of 100: documentation (40), cyclomatic
 * complexity (30) and error-handling coverage (30).
 */

import { cyclomaticComplexity } from "../parser/cfg.js";
import { operationsOfKind } from "../parser/operations.js";
import type {
  ArithmeticOp,
  ContractModel,
  FunctionModel,
  FunctionQualityScore,
  QualitySummary,
} from "../types/index.js";

const DOCUMENTATION_POINTS = 40;
const COMPLEXITY_POINTS = 30;
const ERROR_HANDLING_POINTS = 30;
/** Points lost per unit of complexity above the threshold */
const COMPLEXITY_STEP = 3;

const OVERFLOWING_OPERATORS = new Set(["+", "-", "*", "**"]);

// ============================================================================
// Fallible operations
// ============================================================================

/** Unchecked arithmetic that can wrap on a balance or an index. */
export function riskyArithmetic(fn: Pick<FunctionModel, "operations">): ArithmeticOp[] {
  return operationsOfKind(fn, "arithmetic").filter(
    (op) => !op.checked && op.usage !== "value" && OVERFLOWING_OPERATORS.has(op.operator)
  );
}

export function hasValidationGuard(fn: Pick<FunctionModel, "operations">): boolean {
  return operationsOfKind(fn, "guard").some((guard) => guard.guard === "validation");
}

/**
 * Fraction of fallible operations the function handles: external calls whose
 * result is checked, and risky arithmetic behind a validation guard. A
 * function with nothing fallible is fully covered.
 */
export function errorHandlingCoverage(fn: Pick<FunctionModel, "operations">): number {
  const calls = operationsOfKind(fn, "external-call");
  const arithmetic = riskyArithmetic(fn);
  const total = calls.length + arithmetic.length;
  if (total === 0) return 1;

  const handledCalls = calls.filter((call) => call.resultChecked).length;
  const handledArithmetic = hasValidationGuard(fn) ? arithmetic.length : 0;
  return (handledCalls + handledArithmetic) / total;
}

// ============================================================================
// Scores
// ============================================================================

export function isDocumented(fn: Pick<FunctionModel, "documentation">): boolean {
  return fn.documentation !== undefined && fn.documentation.trim().length > 0;
}

export function functionQuality(fn: FunctionModel, complexityThreshold: number): FunctionQualityScore {
  const documented = isDocumented(fn);
  const complexity = cyclomaticComplexity(fn.controlFlow);
  const errorHandling = errorHandlingCoverage(fn);

  const over = Math.max(0, complexity - complexityThreshold);
  const complexityPoints = Math.max(0, COMPLEXITY_POINTS - over * COMPLEXITY_STEP);

  return {
    function: fn.name,
    score:
      (documented ? DOCUMENTATION_POINTS : 0) +
      complexityPoints +
      Math.round(ERROR_HANDLING_POINTS * errorHandling),
    documented,
    complexity,
    errorHandling: Math.round(errorHandling * 100) / 100,
  };
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function summarizeQuality(model: ContractModel, complexityThreshold: number): QualitySummary {
  const functions = model.functions.map((fn) => functionQuality(fn, complexityThreshold));
  return {
    score: Math.round(mean(functions.map((fn) => fn.score))),
    documentationCoverage:
      Math.round(mean(functions.map((fn) => (fn.documented ? 1 : 0))) * 100) / 100,
    averageComplexity: Math.round(mean(functions.map((fn) => fn.complexity)) * 100) / 100,
    functions,
  };
}
