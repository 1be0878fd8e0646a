/**
 * Event Emission Detector
 */

import { mutatesState, operationsOfKind } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, isEntryPoint, type FunctionScope } from "../base.js";

export class EventEmissionDetector extends BaseDetector {
  readonly id = "event-emission";
  readonly name = "Event Emission";
  readonly description = "State-changing entry points that emit no event";
  readonly category = "quality" as const;
  readonly rules = catalogRules("QA-005");

  protected override inspectFunction({ fn }: FunctionScope): RawFinding[] {
    if (fn.isConstructor || !isEntryPoint(fn) || !mutatesState(fn)) return [];
    if (operationsOfKind(fn, "emit").length > 0) return [];
    return [
      this.finding(
        "QA-005",
        fn.location,
        `${fn.name} changes contract state without emitting an event.`,
        { confidence: "medium" }
      ),
    ];
  }
}
