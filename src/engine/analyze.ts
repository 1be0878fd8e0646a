/**
 * Analysis entry points
 *
 * analyze: validated config → cost estimate → detector fan-out →
 * classification → scoring → report.
 */

import {
  parseAnalysisOptions,
  validateDetectors,
  type AnalysisConfig,
  type AnalysisOptions,
} from "../config/schema.js";
import { DEFAULT_DETECTORS, detectorsFor } from "../detectors/index.js";
import { estimateCosts } from "../gas/costEstimator.js";
import { DEFAULT_COST_TABLE, type InstructionCostTable } from "../gas/costTable.js";
import { buildModel, type BuildOptions } from "../parser/modelBuilder.js";
import { aggregateReport } from "../report/aggregator.js";
import { summarizeQuality } from "../scoring/quality.js";
import { buildRuleIndex, classifyFindings } from "../scoring/severityClassifier.js";
import {
  ok,
  type ConfigurationError,
  type ContractModel,
  type Detector,
  type EngineError,
  type Report,
  type Result,
} from "../types/index.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { logger } from "../utils/logger.js";
import { DetectorPipeline, type ProgressCallback } from "./pipeline.js";

const log = logger.child({ component: "engine" });

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeHooks {
  onProgress?: ProgressCallback;
}

export interface BatchInput extends BuildOptions {
  source: string | Uint8Array;
}

interface ResolvedConfig {
  options: AnalysisOptions;
  detectors: readonly Detector[];
  costTable: InstructionCostTable;
}

// ============================================================================
// Configuration
// ============================================================================

function resolveConfig(config: AnalysisConfig): Result<ResolvedConfig, ConfigurationError> {
  const { detectors, costTable, ...raw } = config;
  const options = parseAnalysisOptions(raw);
  if (!options.ok) return options;

  const validated = validateDetectors(detectors ?? DEFAULT_DETECTORS);
  if (!validated.ok) return validated;

  return ok({
    options: options.value,
    detectors: validated.value,
    costTable: costTable ?? DEFAULT_COST_TABLE,
  });
}

// ============================================================================
// Single contract
// ============================================================================

/**
 * Analyze a built contract model.
 *
 * @example
 * ```ts
 * const built = buildModel(source, { file: "src/lib.rs" });
 * if (built.ok) {
 *   const report = await analyze(built.value, { severityFloor: Severity.MEDIUM });
 * }
 * ```
 */
export async function analyze(
  model: ContractModel,
  config: AnalysisConfig = {},
  hooks: AnalyzeHooks = {}
): Promise<Result<Report, EngineError>> {
  const resolved = resolveConfig(config);
  if (!resolved.ok) {
    log.warn("Rejected analysis configuration", { issues: resolved.error.issues });
    return resolved;
  }
  const { options, detectors, costTable } = resolved.value;

  const costs = estimateCosts(model, costTable, options);
  const quality = summarizeQuality(model, options.complexityThreshold);

  if (model.functions.length === 0) {
    log.info("Contract has no functions; nothing to inspect", { contract: model.name, file: model.file });
    return ok(
      aggregateReport({
        model,
        findings: [],
        costs,
        quality,
        diagnostics: model.diagnostics,
        detectorsRun: [],
        config: options,
      })
    );
  }

  const pipeline = new DetectorPipeline(detectorsFor(options.enabledCategories, detectors), options);
  if (hooks.onProgress !== undefined) pipeline.onProgress(hooks.onProgress);

  const result = await log.time(`Analysis of ${model.name}`, () =>
    pipeline.run(model, { config: options, costs, costTable })
  );

  const classified = classifyFindings(
    result.runs.flatMap((run) => run.findings.map((finding) => ({ detector: run.detectorId, finding }))),
    buildRuleIndex(detectors),
    options.disabledRules
  );

  const report = aggregateReport({
    model,
    findings: classified.findings,
    costs,
    quality,
    diagnostics: [...model.diagnostics, ...result.diagnostics, ...classified.diagnostics],
    detectorsRun: result.runs.filter((run) => run.status === "completed").map((run) => run.detectorId),
    config: options,
  });

  log.info("Analysis complete", {
    contract: model.name,
    findings: report.findings.length,
    suppressed: report.summary.suppressed,
    risk: report.risk,
    partial: report.partial,
  });
  return ok(report);
}

/**
 * Build a model from raw input and analyze it.
 */
export async function analyzeSource(
  source: string | Uint8Array,
  buildOptions: BuildOptions = {},
  config: AnalysisConfig = {},
  hooks: AnalyzeHooks = {}
): Promise<Result<Report, EngineError>> {
  const built = buildModel(source, buildOptions);
  if (!built.ok) return built;
  return analyze(built.value, config, hooks);
}

// ============================================================================
// Batch
// ============================================================================

/**
 * Analyze independent contracts concurrently. Results are in input order;
 * one input failing to parse does not affect the others.
 */
export async function analyzeBatch(
  inputs: readonly BatchInput[],
  config: AnalysisConfig = {}
): Promise<Array<Result<Report, EngineError>>> {
  const concurrency = config.maxConcurrency ?? 4;
  return runWithConcurrency(
    inputs,
    ({ source, ...buildOptions }) => analyzeSource(source, buildOptions, config),
    concurrency
  );
}
