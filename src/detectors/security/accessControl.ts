/**
 * Access Control Detector
 *
 * State-changing entry points that never authenticate their caller.
 */

import { operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { FunctionModel, RawFinding, StorageWriteOp } from "../../types/index.js";
import { BaseDetector, isEntryPoint, isReadOnly, type FunctionScope } from "../base.js";

/** Slot names that usually hold configuration only an administrator may change. */
const PRIVILEGED_SLOT =
  /owner|admin|paused|fee|oracle|treasury|implementation|minter|operator|config|rate|price|governance|role/i;

export class AccessControlDetector extends BaseDetector {
  readonly id = "access-control";
  readonly name = "Access Control";
  readonly description = "Unauthenticated entry points that write privileged or caller-keyed storage";
  readonly category = "security" as const;
  readonly rules = catalogRules("SEC-002");

  protected override inspectFunction({ model, fn }: FunctionScope): RawFinding[] {
    if (fn.isConstructor || !isEntryPoint(fn) || isReadOnly(fn) || isAuthenticated(fn)) {
      return [];
    }

    const writes = operationsOfKind(fn, "storage-write");
    const parameters = fn.parameters.map((param) => param.name);
    const usesCaller = involvesCaller(fn);

    const privileged = writes.find((op) => PRIVILEGED_SLOT.test(op.slot));
    if (privileged !== undefined) {
      return [this.gap(fn, privileged, `writes the privileged slot ${privileged.slot}`)];
    }

    if (!usesCaller) {
      const keyed = writes.find((op) => op.keyRefs.some((ref) => parameters.includes(ref)));
      if (keyed !== undefined) {
        return [this.gap(fn, keyed, `writes ${keyed.slot} at a key chosen by the caller`)];
      }

      const typeOf = new Map(model.storage.map((slot) => [slot.name, slot.typeClass]));
      const direct = writes.find(
        (op) =>
          op.key === undefined &&
          typeOf.get(op.slot) === "value" &&
          op.valueRefs.some((ref) => parameters.includes(ref))
      );
      if (direct !== undefined) {
        return [
          this.finding(
            "SEC-002",
            direct.location,
            `${fn.name} sets ${direct.slot} straight from a parameter without checking who the caller is.`,
            { match: "partial", confidence: "medium" }
          ),
        ];
      }
    }
    return [];
  }

  private gap(fn: FunctionModel, write: StorageWriteOp, what: string): RawFinding {
    return this.finding(
      "SEC-002",
      write.location,
      `${fn.name} is callable by anyone and ${what} without an access-control check.`
    );
  }
}

function isAuthenticated(fn: FunctionModel): boolean {
  return (
    fn.modifiers.some((modifier) => modifier.kind === "access-control") ||
    operationsOfKind(fn, "guard").some((guard) => guard.guard === "access-control")
  );
}

/** The caller's own identity scopes the change (e.g. debiting their balance). */
function involvesCaller(fn: FunctionModel): boolean {
  return (
    operationsOfKind(fn, "env-read").some((op) => op.variable === "msg-sender") ||
    operationsOfKind(fn, "storage-write").some((op) => op.keyRefs.includes("msg.sender"))
  );
}
