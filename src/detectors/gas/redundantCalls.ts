/**
 * Redundant Call Detector
 */

import { costKey } from "../../gas/costTable.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { ExternalCallOp, Operation, RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

function callKey(call: ExternalCallOp): string {
  return [call.method, call.target, call.selector ?? "", call.arguments].join("|");
}

export class RedundantCallDetector extends BaseDetector {
  readonly id = "redundant-calls";
  readonly name = "Redundant External Calls";
  readonly description = "Identical external calls repeated on the same path";
  readonly category = "performance" as const;
  readonly rules = catalogRules("GAS-003");

  protected override inspectFunction({ fn, context }: FunctionScope): RawFinding[] {
    const duplicates: ExternalCallOp[] = [];
    collectDuplicates(fn.operations, new Set(), duplicates);
    return duplicates.map((call) =>
      this.finding(
        "GAS-003",
        call.location,
        `${fn.name} repeats the call ${call.selector ?? call.method} on ${call.target} with the same arguments.`,
        {
          confidence: "medium",
          estimatedGasSavings: context.costTable.lookup(costKey(call))?.gas ?? 0,
        }
      )
    );
  }
}

/**
 * Calls identical to one made earlier on the same path. Payments are never
 * duplicates, and a storage write in between may change what the callee
 * returns.
 */
function collectDuplicates(ops: readonly Operation[], seen: Set<string>, out: ExternalCallOp[]): void {
  for (const op of ops) {
    switch (op.kind) {
      case "external-call": {
        if (op.valueTransfer) break;
        const key = callKey(op);
        if (seen.has(key)) {
          out.push(op);
        } else {
          seen.add(key);
        }
        break;
      }
      case "storage-write":
        seen.clear();
        break;
      case "branch":
        for (const arm of op.arms) collectDuplicates(arm, new Set(seen), out);
        break;
      case "loop":
        collectDuplicates(op.body, new Set(seen), out);
        break;
      default:
        break;
    }
  }
}
