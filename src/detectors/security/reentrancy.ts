/**
 * Reentrancy Detector
 *
 * Flags external calls after which a storage write is still reachable in the
 * control-flow graph, in functions without a reentrancy guard. The call
 * hands control to untrusted code while the contract's state is stale.
 */

import { reachableFrom } from "../../parser/cfg.js";
import { flattenOperations, operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { FunctionModel, RawFinding, StorageWriteOp } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class ReentrancyDetector extends BaseDetector {
  readonly id = "reentrancy";
  readonly name = "Reentrancy";
  readonly description = "External call followed by a reachable storage write without a guard";
  readonly category = "security" as const;
  readonly rules = catalogRules("SEC-001");

  protected override inspectFunction({ model, fn }: FunctionScope): RawFinding[] {
    if (hasReentrancyGuard(fn)) return [];

    const operations = flattenOperations(fn.operations);
    const writes = operations.filter((op): op is StorageWriteOp => op.kind === "storage-write");
    if (writes.length === 0) return [];

    const findings: RawFinding[] = [];
    for (const call of operationsOfKind(fn, "external-call")) {
      if (call.method === "static-call") continue;
      // Solidity transfer/send forward a 2300 gas stipend, too little to re-enter.
      if (model.dialect === "solidity" && call.method === "transfer") continue;

      const reachable = reachableFrom(fn.controlFlow, call.id);
      const write = writes.find((op) => reachable.has(op.id));
      if (write === undefined) continue;

      const authenticated =
        fn.modifiers.some((modifier) => modifier.kind === "access-control") ||
        operations.some((op) => op.kind === "guard" && op.guard === "access-control" && op.id < call.id);

      findings.push(
        this.finding(
          "SEC-001",
          call.location,
          `External call to ${call.target || "an unknown target"} in ${fn.name} is followed by a write to ${write.slot}; a re-entrant call observes the state before the write.`,
          authenticated ? { match: "partial", confidence: "medium" } : { match: "full" }
        )
      );
    }
    return findings;
  }
}

function hasReentrancyGuard(fn: FunctionModel): boolean {
  return (
    fn.modifiers.some((modifier) => modifier.kind === "reentrancy-guard") ||
    operationsOfKind(fn, "guard").some((guard) => guard.guard === "reentrancy")
  );
}
