/**
 * External Call Detector
 *
 * Trust-boundary checks on call targets: calls into caller-supplied or
 * computed addresses without an allow-list check, and delegate calls to
 * anything but a constant.
 */

import { operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { ExternalCallOp, RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class ExternalCallDetector extends BaseDetector {
  readonly id = "external-calls";
  readonly name = "External Calls";
  readonly description = "Calls crossing the trust boundary without target validation";
  readonly category = "security" as const;
  readonly rules = catalogRules("SEC-004", "SEC-005");

  protected override inspectFunction({ model, fn, context }: FunctionScope): RawFinding[] {
    const trusted = new Set(context.config.trustedTargets);
    const findings: RawFinding[] = [];

    for (const call of operationsOfKind(fn, "external-call")) {
      if (call.validated || trusted.has(call.target)) continue;

      if (call.method === "delegate-call") {
        if (call.targetKind !== "constant") findings.push(this.delegateCall(fn.name, call));
        continue;
      }

      if (call.targetKind === "parameter") {
        findings.push(
          this.finding(
            "SEC-004",
            call.location,
            `${fn.name} calls ${call.target}, an address supplied by the caller, without validating it.`
          )
        );
      } else if (call.targetKind === "computed") {
        findings.push(
          this.finding(
            "SEC-004",
            call.location,
            `${fn.name} calls a computed target (${call.target}) that is never checked against an allow-list.`,
            { match: "partial", confidence: model.dialect === "wasm" ? "low" : "medium" }
          )
        );
      }
    }
    return findings;
  }

  private delegateCall(fnName: string, call: ExternalCallOp): RawFinding {
    const callerSupplied = call.targetKind === "parameter" || call.targetKind === "msg-sender";
    return this.finding(
      "SEC-005",
      call.location,
      `${fnName} delegates to ${call.target}, which runs foreign code against this contract's storage.`,
      callerSupplied ? { match: "full" } : { match: "partial", confidence: "medium" }
    );
  }
}
