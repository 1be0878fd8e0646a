/**
 * Stylus Contract Analyzer
 *
 * Static analysis for Arbitrum Stylus contracts (Rust source or compiled
 * WASM) and Solidity sources: security, gas and quality findings with
 * deterministic, structured reports.
 *
 * @example
 * ```ts
 * import { analyzeSource, Severity } from "stylus-contract-analyzer";
 *
 * const result = await analyzeSource(source, { file: "src/lib.rs" }, { severityFloor: Severity.LOW });
 * if (result.ok) {
 *   for (const finding of result.value.findings) {
 *     console.log(finding.severity, finding.ruleId, finding.title);
 *   }
 * }
 * ```
 */

// Engine
export { analyze, analyzeBatch, analyzeSource, type AnalyzeHooks, type BatchInput } from "./engine/analyze.js";
export {
  DeadlineExceededError,
  DetectorPipeline,
  type DetectorProgress,
  type PipelineOptions,
  type PipelineResult,
  type PipelineServices,
  type ProgressCallback,
} from "./engine/pipeline.js";

// Model builder
export { buildModel, detectDialect, DEFAULT_FILE_LABEL, type BuildOptions } from "./parser/modelBuilder.js";
export { buildControlFlow, cyclomaticComplexity, reachableFrom } from "./parser/cfg.js";
export { flattenOperations, operationsOfKind, walkOperations, type WalkState } from "./parser/operations.js";

// Costs
export {
  DEFAULT_COST_TABLE,
  INK_PER_GAS,
  costKey,
  createCostTable,
  type CostEntry,
  type InstructionCostTable,
  type StorageTemperature,
} from "./gas/costTable.js";
export { estimateCosts, type EstimatorOptions } from "./gas/costEstimator.js";

// Detectors, classification and scoring
export * from "./detectors/index.js";
export { RULE_CATALOG, catalogRules, getRule } from "./scoring/ruleCatalog.js";
export {
  buildRuleIndex,
  classifyFinding,
  classifyFindings,
  findingId,
  type AttributedFinding,
  type ClassificationResult,
} from "./scoring/severityClassifier.js";
export { assessRisk, scoreCategories, RISK_DENSITY_THRESHOLD } from "./scoring/scorer.js";
export { functionQuality, summarizeQuality } from "./scoring/quality.js";
export {
  aggregateReport,
  compareFindings,
  deduplicateFindings,
  sortFindings,
  type AggregationInput,
} from "./report/aggregator.js";
export { correlateFindings } from "./report/correlation.js";

// Configuration
export {
  AnalysisOptionsSchema,
  parseAnalysisOptions,
  validateDetectors,
  type AnalysisConfig,
  type AnalysisOptions,
  type AnalysisOptionsInput,
} from "./config/schema.js";
export { CONFIG_FILE_NAMES, findConfigFile, loadAnalysisConfig } from "./config/loader.js";

// Types and utilities
export * from "./types/index.js";
export * from "./utils/index.js";
