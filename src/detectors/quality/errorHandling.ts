/**
 * Error Handling Detector
 *
 * Fallible operations whose failure goes unnoticed: external calls whose
 * result is dropped, and overflow-prone arithmetic with no input validation.
 */

import { operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import { hasValidationGuard, riskyArithmetic } from "../../scoring/quality.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class ErrorHandlingDetector extends BaseDetector {
  readonly id = "error-handling";
  readonly name = "Error Handling";
  readonly description = "Unchecked call results and unvalidated fallible arithmetic";
  readonly category = "quality" as const;
  readonly rules = catalogRules("QA-003");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    const findings: RawFinding[] = operationsOfKind(fn, "external-call")
      .filter((call) => !call.resultChecked)
      .map((call) =>
        this.finding(
          "QA-003",
          call.location,
          `The result of the call to ${call.target || "an unknown target"} in ${fn.name} is never checked; a failed call goes unnoticed.`
        )
      );

    if (!hasValidationGuard(fn)) {
      for (const op of riskyArithmetic(fn)) {
        findings.push(
          this.finding(
            "QA-003",
            op.location,
            `${fn.name} performs '${op.operator}' on ${op.operands.join(", ")} without validating the inputs first.`,
            { match: "partial", confidence: "medium" }
          )
        );
      }
    }
    return findings;
  }
}
