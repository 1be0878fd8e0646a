/**
 * Unsafe Code Detector
 */

import { operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { RawFinding, UnsafeReason } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

const REASON_TEXT: Record<UnsafeReason, string> = {
  "unsafe-block": "an unsafe block",
  "raw-pointer": "raw pointer manipulation",
  transmute: "mem::transmute",
  "uninitialized-memory": "uninitialized memory",
  "manual-memory": "manual memory management",
  "inline-assembly": "inline assembly",
  selfdestruct: "selfdestruct",
};

export class UnsafeCodeDetector extends BaseDetector {
  readonly id = "unsafe-code";
  readonly name = "Unsafe Code";
  readonly description = "Memory-unsafe constructs, inline assembly and self-destruction";
  readonly category = "security" as const;
  readonly rules = catalogRules("SEC-006");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    return operationsOfKind(fn, "unsafe").map((op) =>
      this.finding(
        "SEC-006",
        op.location,
        `${fn.name} uses ${REASON_TEXT[op.reason]}, which bypasses the compiler's safety checks.`,
        op.reason === "inline-assembly" ? { match: "partial", confidence: "medium" } : {}
      )
    );
  }
}
