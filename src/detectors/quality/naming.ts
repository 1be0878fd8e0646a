/**
 * Naming Convention Detector
 *
 * Stylus code follows Rust conventions (snake_case items, UPPER_CASE
 * constants); Solidity follows its style guide (mixedCase functions and
 * variables, UPPER_CASE constants). Contract names are PascalCase in both.
 */

import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { ContractModel, DetectorContext, Dialect, RawFinding, SourceLocation } from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

const PASCAL_CASE = /^[A-Z][A-Za-z0-9]*$/;
const SNAKE_CASE = /^_?[a-z][a-z0-9_]*$/;
const MIXED_CASE = /^_?[a-z][A-Za-z0-9]*$/;
const UPPER_CASE = /^[A-Z][A-Z0-9_]*$/;

interface Convention {
  pattern: RegExp;
  label: string;
}

function memberConvention(dialect: Dialect): Convention {
  return dialect === "stylus"
    ? { pattern: SNAKE_CASE, label: "snake_case" }
    : { pattern: MIXED_CASE, label: "mixedCase" };
}

export class NamingDetector extends BaseDetector {
  readonly id = "naming";
  readonly name = "Naming Conventions";
  readonly description = "Identifiers that break the language's naming conventions";
  readonly category = "quality" as const;
  readonly rules = catalogRules("QA-004");

  protected override inspectFunction({ model, fn }: FunctionScope): RawFinding[] {
    // Export names of compiled artifacts are chosen by the toolchain.
    if (model.dialect === "wasm" || fn.isConstructor) return [];
    const convention = memberConvention(model.dialect);
    if (convention.pattern.test(fn.name)) return [];
    return [this.misnamed("Function", fn.name, convention.label, fn.location)];
  }

  protected override inspectContract(model: ContractModel, _context: DetectorContext): RawFinding[] {
    if (model.dialect === "wasm") return [];
    const findings: RawFinding[] = [];

    if (!PASCAL_CASE.test(model.name)) {
      findings.push(this.misnamed("Contract", model.name, "PascalCase", { file: model.file, line: 1, column: 1 }));
    }

    const convention = memberConvention(model.dialect);
    for (const slot of model.storage) {
      if (!convention.pattern.test(slot.name)) {
        findings.push(this.misnamed("State variable", slot.name, convention.label, slot.location));
      }
    }
    for (const constant of model.constants) {
      if (!UPPER_CASE.test(constant.name)) {
        findings.push(this.misnamed("Constant", constant.name, "UPPER_CASE", constant.location));
      }
    }
    return findings;
  }

  private misnamed(what: string, name: string, expected: string, location: SourceLocation): RawFinding {
    return this.finding("QA-004", location, `${what} '${name}' is not ${expected}.`);
  }
}
