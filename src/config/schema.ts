/**
 * Analysis configuration
 *
 * Options are validated with zod before any detector runs; an invalid value
 * rejects the whole call with a ConfigurationError.
 */

import { z } from "zod";
import {
  CATEGORIES,
  Severity,
  err,
  ok,
  type ConfigurationError,
  type Detector,
  type Result,
} from "../types/index.js";
import type { InstructionCostTable } from "../gas/costTable.js";

// ============================================================================
// Schema Definitions
// ============================================================================

export const CategorySchema = z.enum(["security", "performance", "quality"]);

export const SeveritySchema = z.nativeEnum(Severity);

/** Upper bound on the iterations priced for any single loop */
export const MAX_LOOP_ITERATIONS = 1_000_000;

export const AnalysisOptionsSchema = z
  .object({
    /** Detector families to run */
    enabledCategories: z.array(CategorySchema).min(1).default([...CATEGORIES]),
    /** Per-function gas above which GAS-001 fires */
    gasCostThreshold: z.number().int().nonnegative().default(100_000),
    /** Least severe finding listed in the report */
    severityFloor: SeveritySchema.default(Severity.INFORMATIONAL),
    /** Budget for the whole detector fan-out of one contract */
    timeoutMs: z.number().int().positive().default(30_000),
    /** Budget for a single detector; unbounded when absent */
    detectorTimeoutMs: z.number().int().positive().optional(),
    maxConcurrency: z.number().int().min(1).max(64).default(4),
    complexityThreshold: z.number().int().positive().default(10),
    /** Iteration count assumed for loops without a literal bound */
    assumedLoopIterations: z.number().int().positive().max(MAX_LOOP_ITERATIONS).default(10),
    /** kg CO2e per weighted gas unit */
    carbonCoefficient: z.number().nonnegative().default(0.0000002),
    /** Gas charged for operations missing from the cost table */
    defaultOperationCost: z.number().int().nonnegative().default(700),
    /** Call targets treated as already validated */
    trustedTargets: z.array(z.string().min(1)).default([]),
    disabledRules: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type AnalysisOptions = z.infer<typeof AnalysisOptionsSchema>;

export type AnalysisOptionsInput = z.input<typeof AnalysisOptionsSchema>;

/**
 * What callers pass to `analyze`. Detectors are code, so they sit beside the
 * serializable options rather than inside the schema.
 */
export type AnalysisConfig = AnalysisOptionsInput & {
  detectors?: readonly Detector[];
  /** Replaces the default instruction cost table */
  costTable?: InstructionCostTable;
};

// ============================================================================
// Validation
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function configurationError(message: string, issues: string[]): ConfigurationError {
  return { code: "CONFIGURATION_ERROR", message, issues };
}

/**
 * Validate raw options (object literal, parsed YAML or JSON).
 */
export function parseAnalysisOptions(raw: unknown): Result<AnalysisOptions, ConfigurationError> {
  const parsed = AnalysisOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return err(configurationError(`Invalid analysis configuration: ${issues.join("; ")}`, issues));
  }
  return ok(parsed.data);
}

/**
 * Check a detector list supplied through configuration: ids must be present
 * and unique, and every rule a detector declares must belong to its category.
 */
export function validateDetectors(
  detectors: readonly Detector[]
): Result<readonly Detector[], ConfigurationError> {
  const issues: string[] = [];
  const seen = new Set<string>();

  detectors.forEach((detector, index) => {
    if (detector.id.trim().length === 0) {
      issues.push(`detectors.${index}: id must not be empty`);
    } else if (seen.has(detector.id)) {
      issues.push(`detectors.${index}: duplicate detector id "${detector.id}"`);
    }
    seen.add(detector.id);

    for (const rule of detector.rules) {
      if (rule.category !== detector.category) {
        issues.push(
          `detectors.${index}: rule ${rule.id} is ${rule.category} but detector is ${detector.category}`
        );
      }
    }
  });

  if (issues.length > 0) {
    return err(configurationError(`Invalid detector list: ${issues.join("; ")}`, issues));
  }
  return ok(detectors);
}
