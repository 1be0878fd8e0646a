/**
 * Quality Detector Tests
 *
 * Tests for documentation, complexity, error handling, naming and event
 * checks using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import {
  ComplexityDetector,
  DocumentationDetector,
  ErrorHandlingDetector,
  EventEmissionDetector,
  NamingDetector,
} from "../../src/detectors/index.js";
import type { BaseDetector } from "../../src/detectors/base.js";
import type { AnalysisOptionsInput } from "../../src/config/schema.js";
import type { ContractModel, RawFinding } from "../../src/types/index.js";
import { TEST_FILE, makeContext, makeContract, makeFunction, makeSlot, opsFor, withArms } from "../helpers/models.js";

function run(detector: BaseDetector, model: ContractModel, options: AnalysisOptionsInput = {}): RawFinding[] {
  return detector.inspect(model, makeContext(model, options));
}

describe("DocumentationDetector", () => {
  const detector = new DocumentationDetector();

  it("should flag undocumented entry points only", () => {
    // Given: Documented, undocumented, internal and constructor functions
    const model = makeContract([
      makeFunction({ name: "deposit", documentation: "Deposit ether." }),
      makeFunction({ name: "withdraw", visibility: "external" }),
      makeFunction({ name: "helper", visibility: "private" }),
      makeFunction({ name: "constructor", isConstructor: true }),
    ]);

    // When: Inspecting
    const findings = run(detector, model);

    // Then: Only withdraw
    expect(findings.map((finding) => finding.description)).toEqual([
      "external function withdraw has no documentation.",
    ]);
  });

  it("should treat whitespace-only docs as missing and skip compiled artifacts", () => {
    // Given: A blank doc comment in source, and an undocumented export
    const source = makeContract([makeFunction({ name: "f", documentation: "   " })]);
    const artifact = makeContract([makeFunction({ name: "f" })], { dialect: "wasm" });

    // When/Then: Source is flagged, the artifact is not
    expect(run(detector, source)).toHaveLength(1);
    expect(run(detector, artifact)).toEqual([]);
  });
});

describe("ComplexityDetector", () => {
  it("should flag functions above the complexity threshold", () => {
    // Given: One two-armed branch (complexity 2) and a threshold of 1
    const op = opsFor("route");
    const branch = op.branch();
    const fn = makeFunction({ name: "route", operations: [withArms(branch, [[op.emit()], [op.emit()]])] });

    // When: Inspecting
    const findings = run(new ComplexityDetector(), makeContract([fn]), { complexityThreshold: 1 });

    // Then: Reported with the computed value
    expect(findings.map((finding) => finding.description)).toEqual([
      "route has a cyclomatic complexity of 2 (threshold 1).",
    ]);
  });

  it("should accept straight-line code", () => {
    // Given: No branches
    const op = opsFor("get");
    const fn = makeFunction({ name: "get", operations: [op.read("x")] });

    // When/Then: Complexity 1 is never above a positive threshold
    expect(run(new ComplexityDetector(), makeContract([fn]), { complexityThreshold: 1 })).toEqual([]);
  });
});

describe("ErrorHandlingDetector", () => {
  const detector = new ErrorHandlingDetector();

  it("should flag unchecked call results and unvalidated arithmetic", () => {
    // Given: A dropped call result and an unchecked addition
    const op = opsFor("sync");
    const fn = makeFunction({
      name: "sync",
      operations: [op.call({ resultChecked: false }), op.arith({ operands: ["a", "b"] })],
    });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: Full for the call, partial for the arithmetic
    expect(findings.map((finding) => [finding.description, finding.match])).toEqual([
      ["The result of the call to token in sync is never checked; a failed call goes unnoticed.", "full"],
      ["sync performs '+' on a, b without validating the inputs first.", "partial"],
    ]);
  });

  it("should accept arithmetic behind a validation guard", () => {
    // Given: require(amount > 0) before the addition
    const op = opsFor("deposit");
    const fn = makeFunction({
      name: "deposit",
      operations: [op.guard("validation", "amount > 0"), op.arith({ operands: ["balance", "amount"] })],
    });

    // When/Then: Nothing to report
    expect(run(detector, makeContract([fn]))).toEqual([]);
  });
});

describe("EventEmissionDetector", () => {
  const detector = new EventEmissionDetector();

  it("should flag state-changing entry points without events", () => {
    // Given: One silent writer, one emitting writer, one reader
    const a = opsFor("set");
    const b = opsFor("update");
    const c = opsFor("get");
    const model = makeContract([
      makeFunction({ name: "set", operations: [a.write("x")] }),
      makeFunction({ name: "update", operations: [b.write("x"), b.emit("Updated")] }),
      makeFunction({ name: "get", operations: [c.read("x")] }),
    ]);

    // When: Inspecting
    const findings = run(detector, model);

    // Then: Only set
    expect(findings).toEqual([
      {
        ruleId: "QA-005",
        location: { file: TEST_FILE, line: 10, column: 5, function: "set" },
        description: "set changes contract state without emitting an event.",
        match: "full",
        confidence: "medium",
      },
    ]);
  });
});

describe("NamingDetector", () => {
  const detector = new NamingDetector();

  it("should apply Rust conventions to Stylus contracts", () => {
    // Given: Misnamed contract, function, slot and constant
    const model = makeContract([makeFunction({ name: "doThing" }), makeFunction({ name: "do_other" })], {
      name: "vault_v2",
      storage: [makeSlot("TotalSupply"), makeSlot("owner")],
      constants: [{ name: "maxSupply", location: { file: TEST_FILE, line: 2, column: 1 } }],
    });

    // When: Inspecting
    const findings = run(detector, model);

    // Then: Function first, then contract-level names
    expect(findings.map((finding) => finding.description)).toEqual([
      "Function 'doThing' is not snake_case.",
      "Contract 'vault_v2' is not PascalCase.",
      "State variable 'TotalSupply' is not snake_case.",
      "Constant 'maxSupply' is not UPPER_CASE.",
    ]);
  });

  it("should apply mixedCase to Solidity members", () => {
    // Given: A snake_case Solidity function
    const model = makeContract([makeFunction({ name: "do_thing" }), makeFunction({ name: "doThing" })], {
      dialect: "solidity",
      file: "Vault.sol",
    });

    // When: Inspecting
    const findings = run(detector, model);

    // Then: Only the snake_case name
    expect(findings.map((finding) => finding.description)).toEqual(["Function 'do_thing' is not mixedCase."]);
  });

  it("should skip compiled artifacts", () => {
    // Given: Toolchain-generated export names
    const model = makeContract([makeFunction({ name: "user_entrypoint" }), makeFunction({ name: "Func3" })], {
      dialect: "wasm",
      name: "contract.wasm",
    });

    // When/Then: Nothing to report
    expect(run(detector, model)).toEqual([]);
  });
});
