/**
 * Unchecked Arithmetic Detector
 */

import { catalogRules } from "../../scoring/ruleCatalog.js";
import { riskyArithmetic } from "../../scoring/quality.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, callerInfluenced, type FunctionScope } from "../base.js";

export class UncheckedArithmeticDetector extends BaseDetector {
  readonly id = "unchecked-arithmetic";
  readonly name = "Unchecked Arithmetic";
  readonly description = "Overflow-prone arithmetic on balances and indices";
  readonly category = "security" as const;
  readonly rules = catalogRules("SEC-003");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    return riskyArithmetic(fn).map((op) => {
      const influenced =
        op.operands.some((operand) => callerInfluenced(operand, fn)) ||
        (op.target !== undefined && callerInfluenced(op.target, fn));
      const subject = op.usage === "index" ? "an index" : "a balance";
      return this.finding(
        "SEC-003",
        op.location,
        `Unchecked '${op.operator}' on ${subject} in ${fn.name}${
          influenced ? " with a caller-controlled operand" : ""
        } can wrap around.`,
        influenced ? { match: "full" } : { match: "partial", confidence: "medium" }
      );
    });
  }
}
