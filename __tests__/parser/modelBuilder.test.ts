/**
 * Model Builder Tests
 *
 * Tests for dialect detection and the Stylus, Solidity and WASM front ends
 * using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import { buildModel, detectDialect } from "../../src/parser/modelBuilder.js";
import { cyclomaticComplexity, reachableFrom } from "../../src/parser/cfg.js";
import { UNKNOWN_SLOT, unwrap } from "../../src/types/index.js";
import {
  LOAD_BODY,
  PARTIAL_BANK_SOURCE,
  PARTIAL_VAULT_SOURCE,
  SIMD_BODY,
  SIMPLE_STORAGE_SOURCE,
  STORAGE_ONLY_SOURCE,
  VAULT_SOURCE,
  wasmModule,
} from "../helpers/sources.js";

// ============================================================================
// Dialect detection
// ============================================================================

describe("detectDialect", () => {
  it("should recognize each input kind", () => {
    expect(detectDialect(SIMPLE_STORAGE_SOURCE)).toBe("solidity");
    expect(detectDialect(VAULT_SOURCE)).toBe("stylus");
    expect(detectDialect(wasmModule(LOAD_BODY))).toBe("wasm");
    expect(detectDialect("\0asm")).toBe("wasm");
    expect(detectDialect(Buffer.from(VAULT_SOURCE, "utf8"))).toBe("stylus");
  });
});

// ============================================================================
// Stylus
// ============================================================================

describe("buildModel (stylus)", () => {
  it("should extract storage, functions and operations", () => {
    // Given: The vault source
    // When: Building the model
    const model = unwrap(buildModel(VAULT_SOURCE, { file: "src/lib.rs" }));

    // Then: Contract structure
    expect(model.name).toBe("Vault");
    expect(model.dialect).toBe("stylus");
    expect(model.storage.map((slot) => [slot.name, slot.typeClass, slot.access])).toEqual([
      ["balances", "mapping", "read-write"],
    ]);

    const [withdraw] = model.functions;
    expect(withdraw).toMatchObject({
      name: "withdraw",
      visibility: "public",
      mutability: "nonpayable",
      documentation: "Withdraws the full balance of the caller.",
      isConstructor: false,
      location: { file: "src/lib.rs", line: 13, column: 12, function: "withdraw" },
    });
    expect(withdraw?.operations.map((op) => op.kind)).toEqual([
      "env-read",
      "storage-read",
      "external-call",
      "storage-write",
    ]);
  });

  it("should build a control-flow graph and list call sites", () => {
    // Given/When: The vault model
    const model = unwrap(buildModel(VAULT_SOURCE, { file: "src/lib.rs" }));
    const withdraw = model.functions[0];
    if (withdraw === undefined) throw new Error("withdraw missing");

    // Then: Straight line from entry to exit, write reachable from the call
    expect(withdraw.controlFlow.entry).toBe(0);
    expect(withdraw.controlFlow.exit).toBe(5);
    expect(cyclomaticComplexity(withdraw.controlFlow)).toBe(1);
    expect(reachableFrom(withdraw.controlFlow, 3).has(4)).toBe(true);
    expect(model.externalCalls).toHaveLength(1);
    expect(model.externalCalls[0]).toMatchObject({ function: "withdraw", valueTransfer: true, resultChecked: true });
    expect(model.sourceMap["fn:withdraw"]).toEqual(withdraw.location);
  });

  it("should return a deeply frozen model", () => {
    const model = unwrap(buildModel(VAULT_SOURCE));
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.functions[0]?.operations)).toBe(true);
    expect(model.file).toBe("<input>");
  });

  it("should skip a malformed function with one diagnostic", () => {
    // Given: A second function with an unclosed parameter list
    // When: Building
    const model = unwrap(buildModel(PARTIAL_VAULT_SOURCE, { file: "src/lib.rs" }));

    // Then: withdraw survives, deposit is reported
    expect(model.functions.map((fn) => fn.name)).toEqual(["withdraw"]);
    expect(model.diagnostics).toHaveLength(1);
    expect(model.diagnostics[0]).toMatchObject({
      code: "PARSE_ERROR",
      message: "Skipped malformed function 'deposit': Expected ')' but found '}'",
      location: { line: 21, function: "deposit" },
    });
  });

  it("should accept a contract without functions", () => {
    const model = unwrap(buildModel(STORAGE_ONLY_SOURCE));
    expect(model.name).toBe("Registry");
    expect(model.functions).toEqual([]);
    expect(model.storage.map((slot) => slot.access)).toEqual(["unused"]);
  });

  it("should reject input with no contract structure", () => {
    // Given: Empty and structureless input
    const empty = buildModel("   \n");
    const prose = buildModel("let x = 1;");

    // Then: Fatal parse errors
    expect(empty.ok ? undefined : empty.error.message).toBe("Empty input");
    expect(prose.ok).toBe(false);
    expect(prose.ok ? undefined : prose.error.code).toBe("PARSE_ERROR");
  });
});

// ============================================================================
// Solidity
// ============================================================================

describe("buildModel (solidity)", () => {
  it("should model the last contract of the file", () => {
    // Given/When: A simple storage contract
    const model = unwrap(buildModel(SIMPLE_STORAGE_SOURCE, { file: "SimpleStorage.sol" }));

    // Then: Structure
    expect(model.dialect).toBe("solidity");
    expect(model.name).toBe("SimpleStorage");
    expect(model.functions.map((fn) => [fn.name, fn.visibility])).toEqual([
      ["setValue", "external"],
      ["getValue", "external"],
    ]);
    expect(model.functions[1]?.mutability).toBe("view");
    expect(model.storage.map((slot) => slot.name)).toEqual(["value"]);
  });

  it("should report a malformed function once", () => {
    // Given: b never closes its parameter list
    // When: Building
    const model = unwrap(buildModel(PARTIAL_BANK_SOURCE, { file: "Bank.sol" }));

    // Then: a survives, one diagnostic for b
    expect(model.functions.map((fn) => fn.name)).toEqual(["a"]);
    expect(model.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.message])).toEqual([
      ["PARSE_ERROR", "Skipped malformed function 'b': Expected ')' but found '}'"],
    ]);
  });
});

// ============================================================================
// WASM
// ============================================================================

describe("buildModel (wasm)", () => {
  it("should decode host calls into operations", () => {
    // Given: A module whose entry point loads a storage word
    const bytes = wasmModule(LOAD_BODY);

    // When: Building
    const model = unwrap(buildModel(bytes, { file: "build/counter.wasm" }));

    // Then: One exported function reading an unresolved slot
    expect(model.dialect).toBe("wasm");
    expect(model.name).toBe("counter");
    expect(model.functions.map((fn) => [fn.name, fn.visibility])).toEqual([["user_entrypoint", "external"]]);
    expect(model.functions[0]?.operations).toMatchObject([{ kind: "storage-read", slot: UNKNOWN_SLOT }]);
    expect(model.artifact).toEqual(bytes);
    expect(model.metrics).toEqual({ lines: 1, byteLength: bytes.length });
  });

  it("should not let callers change the artifact bytes", () => {
    // Given: A built module and the bytes it came from
    const bytes = wasmModule(LOAD_BODY);
    const model = unwrap(buildModel(bytes, { file: "counter.wasm" }));

    // When: Overwriting both
    model.artifact?.fill(0);
    bytes.fill(0);

    // Then: The model still holds the module
    expect(model.artifact?.subarray(0, 4)).toEqual(Uint8Array.from([0x00, 0x61, 0x73, 0x6d]));
    expect(Object.isFrozen(model)).toBe(true);
  });

  it("should skip undecodable function bodies", () => {
    // Given: A second body using SIMD
    const bytes = wasmModule(LOAD_BODY, SIMD_BODY);

    // When: Building
    const model = unwrap(buildModel(bytes, { file: "counter.wasm" }));

    // Then: The first function survives
    expect(model.functions.map((fn) => fn.name)).toEqual(["user_entrypoint"]);
    expect(model.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "Skipped malformed function 'func_2': SIMD instructions are not supported",
    ]);
  });

  it("should reject truncated modules", () => {
    // Given: A module cut off inside its sections
    const bytes = wasmModule(LOAD_BODY).slice(0, 20);

    // When/Then: Fatal error
    const result = buildModel(bytes);
    expect(result.ok).toBe(false);
  });
});
