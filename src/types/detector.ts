/**
 * Detector Types
 *
 * Contract between the pipeline and the individual detectors.
 */

import type {
  Category,
  Confidence,
  MatchStrength,
  Severity,
  SourceLocation,
} from "./index.js";
import type { ContractModel } from "./ir.js";
import type { CostReport } from "./report.js";
import type { AnalysisOptions } from "../config/schema.js";
import type { InstructionCostTable } from "../gas/costTable.js";

// ============================================================================
// Rules
// ============================================================================

/** Catalog entry; the severity here is the single source for classification. */
export interface RuleDefinition {
  id: string;
  title: string;
  category: Category;
  severity: Severity;
  recommendation: string;
  swcId?: string;
}

/** Unclassified detector output. Severity is assigned by the classifier. */
export interface RawFinding {
  ruleId: string;
  location: SourceLocation;
  description: string;
  match?: MatchStrength;
  confidence?: Confidence;
  estimatedGasSavings?: number;
}

// ============================================================================
// Detectors
// ============================================================================

export interface DetectorContext {
  readonly config: AnalysisOptions;
  readonly costs: CostReport;
  readonly costTable: InstructionCostTable;
  readonly signal: AbortSignal;
  /**
   * Throws once the detector or contract budget is spent. Compares against the
   * clock, so synchronous detectors stop at their next call.
   */
  throwIfAborted(): void;
}

export interface Detector {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: Category;
  readonly rules: readonly RuleDefinition[];
  inspect(model: ContractModel, context: DetectorContext): RawFinding[] | Promise<RawFinding[]>;
}

export type DetectorStatus = "completed" | "failed" | "timeout" | "skipped";

export interface DetectorRunResult {
  detectorId: string;
  status: DetectorStatus;
  findings: RawFinding[];
  durationMs: number;
  error?: string;
}
