/**
 * Environment Detector
 *
 * Reads of transaction and block context that are unreliable on Arbitrum:
 * block timestamps and numbers follow the L1 loosely, and tx.origin says
 * nothing about who is calling.
 */

import { operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

export class EnvironmentDetector extends BaseDetector {
  readonly id = "environment";
  readonly name = "Block and Origin Dependence";
  readonly description = "Decisions based on block values or tx.origin";
  readonly category = "security" as const;
  readonly rules = catalogRules("SEC-007", "SEC-008");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    const findings: RawFinding[] = [];
    for (const op of operationsOfKind(fn, "env-read")) {
      const match = op.inCondition ? "full" : "partial";
      if (op.variable === "block-timestamp" || op.variable === "block-number") {
        const what = op.variable === "block-timestamp" ? "block timestamp" : "block number";
        findings.push(
          this.finding(
            "SEC-007",
            op.location,
            op.inCondition
              ? `${fn.name} branches on the ${what}, which the sequencer can skew.`
              : `${fn.name} reads the ${what}; on Arbitrum it does not track L2 blocks precisely.`,
            { match, confidence: op.inCondition ? "high" : "low" }
          )
        );
      } else if (op.variable === "tx-origin") {
        findings.push(
          this.finding(
            "SEC-008",
            op.location,
            `${fn.name} relies on tx.origin; any contract the user calls can act on their behalf.`,
            { match, confidence: op.inCondition ? "high" : "medium" }
          )
        );
      }
    }
    return findings;
  }
}
