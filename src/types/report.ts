/**
 * Report, cost and scoring types
 */

import type {
  Category,
  Diagnostic,
  Dialect,
  Finding,
  SourceLocation,
} from "./index.js";
import type { OperationKind } from "./ir.js";

// ============================================================================
// Cost estimates
// ============================================================================

export interface OperationCost {
  operationId: number;
  kind: OperationKind;
  costKey: string;
  /** Gas for a single execution, ignoring loop multipliers */
  gas: number;
  estimated: boolean;
  location: SourceLocation;
}

export interface UnestimatedOperation {
  function: string;
  operationId: number;
  costKey: string;
  location: SourceLocation;
}

export interface FunctionCostEstimate {
  function: string;
  gas: number;
  ink: number;
  /** kg CO2e, a linear transform of weighted gas */
  environmentalImpact: number;
  operations: OperationCost[];
}

export interface CostReport {
  totalGas: number;
  totalInk: number;
  environmentalImpact: number;
  functions: FunctionCostEstimate[];
  unestimated: UnestimatedOperation[];
}

// ============================================================================
// Quality
// ============================================================================

export interface FunctionQualityScore {
  function: string;
  score: number;
  documented: boolean;
  complexity: number;
  /** Fraction of fallible operations with explicit handling, 0..1 */
  errorHandling: number;
}

export interface QualitySummary {
  score: number;
  documentationCoverage: number;
  averageComplexity: number;
  functions: FunctionQualityScore[];
}

// ============================================================================
// Scores and report
// ============================================================================

export type RiskLevel = "critical" | "high" | "medium" | "low" | "none";

export interface CategoryScores {
  security: number;
  performance: number;
  quality: number;
}

export interface ReportSummary {
  total: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
  informational: number;
  byCategory: Record<Category, number>;
  /** Findings hidden by the severity floor */
  suppressed: number;
}

export interface ContractSummary {
  name: string;
  file: string;
  dialect: Dialect;
  functions: number;
  storageSlots: number;
  externalCalls: number;
}

export interface Report {
  contract: ContractSummary;
  findings: Finding[];
  summary: ReportSummary;
  scores: CategoryScores;
  risk: RiskLevel;
  costs: CostReport;
  quality: QualitySummary;
  diagnostics: Diagnostic[];
  detectorsRun: string[];
  partial: boolean;
}
