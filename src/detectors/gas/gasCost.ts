/**
 * Gas Cost Detector
 *
 * Reads the cost report: functions whose estimate exceeds the configured
 * threshold, and operations the cost table could not price.
 */

import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { ContractModel, DetectorContext, RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class GasCostDetector extends BaseDetector {
  readonly id = "gas-cost";
  readonly name = "Gas Cost";
  readonly description = "Functions over the gas threshold and unpriced operations";
  readonly category = "performance" as const;
  readonly rules = catalogRules("GAS-001", "GAS-006");

  protected override inspectFunction({ fn, cost, context }: FunctionScope): RawFinding[] {
    const threshold = context.config.gasCostThreshold;
    if (cost === undefined || cost.gas <= threshold) return [];
    return [
      this.finding(
        "GAS-001",
        fn.location,
        `${fn.name} is estimated at ${cost.gas} gas (${cost.ink} ink), above the threshold of ${threshold}.`,
        { confidence: "medium", estimatedGasSavings: cost.gas - threshold }
      ),
    ];
  }

  protected override inspectContract(_model: ContractModel, context: DetectorContext): RawFinding[] {
    return context.costs.unestimated.map((op) =>
      this.finding(
        "GAS-006",
        op.location,
        `No cost is known for '${op.costKey}' in ${op.function}; ${context.config.defaultOperationCost} gas was assumed.`,
        { confidence: "medium" }
      )
    );
  }
}
