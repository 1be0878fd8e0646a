/**
 * Unbounded Loop Detector
 */

import { operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class UnboundedLoopDetector extends BaseDetector {
  readonly id = "unbounded-loops";
  readonly name = "Unbounded Loops";
  readonly description = "Loops whose iteration count grows with storage or caller input";
  readonly category = "performance" as const;
  readonly rules = catalogRules("GAS-004");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    return operationsOfKind(fn, "loop").flatMap((loop) => {
      const source = loop.boundSource ?? "its bound";
      if (loop.bound === "storage") {
        return [
          this.finding(
            "GAS-004",
            loop.location,
            `Loop in ${fn.name} iterates over ${source}, which grows with contract state and can exhaust the gas limit.`
          ),
        ];
      }
      if (loop.bound === "parameter") {
        return [
          this.finding(
            "GAS-004",
            loop.location,
            `Loop in ${fn.name} runs as many times as the caller-supplied ${source} asks.`,
            { match: "partial", confidence: "medium" }
          ),
        ];
      }
      return [];
    });
  }
}
