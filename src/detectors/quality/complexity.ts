/**
 * Complexity Detector
 */

import { cyclomaticComplexity } from "../../parser/cfg.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class ComplexityDetector extends BaseDetector {
  readonly id = "complexity";
  readonly name = "Complexity";
  readonly description = "Functions whose cyclomatic complexity exceeds the threshold";
  readonly category = "quality" as const;
  readonly rules = catalogRules("QA-002");

  protected override inspectFunction({ fn, context }: FunctionScope): RawFinding[] {
    const complexity = cyclomaticComplexity(fn.controlFlow);
    const threshold = context.config.complexityThreshold;
    if (complexity <= threshold) return [];
    return [
      this.finding(
        "QA-002",
        fn.location,
        `${fn.name} has a cyclomatic complexity of ${complexity} (threshold ${threshold}).`
      ),
    ];
  }
}
