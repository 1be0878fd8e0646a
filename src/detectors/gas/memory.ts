/**
 * Memory Allocation Detector
 *
 * Collections grown without a capacity, and clones, in functions that loop.
 */

import { operationsOfKind, walkOperations } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { AllocationKind, RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

const GROWABLE = new Set<AllocationKind>(["vec", "string", "bytes", "clone"]);

/** Savings assumed for each avoided reallocation or copy. */
const REALLOCATION_SAVINGS = 2_000;

export class MemoryAllocationDetector extends BaseDetector {
  readonly id = "memory-allocation";
  readonly name = "Memory Allocation";
  readonly description = "Allocations without preallocation in looping functions";
  readonly category = "performance" as const;
  readonly rules = catalogRules("GAS-007");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    if (operationsOfKind(fn, "loop").length === 0) return [];

    const findings: RawFinding[] = [];
    walkOperations(fn.operations, (op, state) => {
      if (op.kind !== "memory-alloc" || op.preallocated || !GROWABLE.has(op.allocation)) return;
      const inLoop = state.loopDepth > 0;
      const what = op.allocation === "clone" ? "clones a value" : `allocates a ${op.allocation} without capacity`;
      findings.push(
        this.finding(
          "GAS-007",
          op.location,
          `${fn.name} ${what}${inLoop ? " inside a loop" : " and then loops"}; each growth reallocates and copies.`,
          inLoop
            ? { estimatedGasSavings: REALLOCATION_SAVINGS }
            : { match: "partial", confidence: "medium", estimatedGasSavings: REALLOCATION_SAVINGS }
        )
      );
    });
    return findings;
  }
}
