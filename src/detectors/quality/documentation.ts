/**
 * Documentation Detector
 */

import { catalogRules } from "../../scoring/ruleCatalog.js";
import { isDocumented } from "../../scoring/quality.js";
import type { RawFinding } from "../../types/index.js";
import { BaseDetector, isEntryPoint, type FunctionScope } from "../base.js";

export class DocumentationDetector extends BaseDetector {
  readonly id = "documentation";
  readonly name = "Documentation";
  readonly description = "Externally callable functions without doc comments";
  readonly category = "quality" as const;
  readonly rules = catalogRules("QA-001");

  protected override inspectFunction({ model, fn }: FunctionScope): RawFinding[] {
    // Compiled artifacts carry no comments.
    if (model.dialect === "wasm" || fn.isConstructor || !isEntryPoint(fn) || isDocumented(fn)) {
      return [];
    }
    return [
      this.finding("QA-001", fn.location, `${fn.visibility} function ${fn.name} has no documentation.`),
    ];
  }
}
