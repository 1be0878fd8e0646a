/**
 * Gas Detector Tests
 *
 * Tests for the performance detectors using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import {
  ContractSizeDetector,
  GasCostDetector,
  MemoryAllocationDetector,
  RedundantCallDetector,
  STYLUS_SIZE_LIMIT,
  StorageAccessDetector,
  UnboundedLoopDetector,
  compressedSize,
} from "../../src/detectors/index.js";
import type { BaseDetector } from "../../src/detectors/base.js";
import type { AnalysisOptionsInput } from "../../src/config/schema.js";
import type { ContractModel, HostCallOp, RawFinding } from "../../src/types/index.js";
import { makeContext, makeContract, makeFunction, opsFor, withArms, withBody } from "../helpers/models.js";

function run(detector: BaseDetector, model: ContractModel, options: AnalysisOptionsInput = {}): RawFinding[] {
  return detector.inspect(model, makeContext(model, options));
}

/** Incompressible bytes from a fixed xorshift seed. */
function noise(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = 0x9e3779b9;
  for (let i = 0; i < length; i++) {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    bytes[i] = state & 0xff;
  }
  return bytes;
}

// ============================================================================
// Gas cost
// ============================================================================

describe("GasCostDetector", () => {
  const detector = new GasCostDetector();

  it("should flag functions above the threshold with the excess as savings", () => {
    // Given: Two cold writes (44,200 gas) against a 30,000 threshold
    const op = opsFor("initialize");
    const fn = makeFunction({ name: "initialize", operations: [op.write("a"), op.write("b")] });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]), { gasCostThreshold: 30_000 });

    // Then: GAS-001 with the excess
    expect(findings).toEqual([
      {
        ruleId: "GAS-001",
        location: fn.location,
        description: "initialize is estimated at 44200 gas (442000000 ink), above the threshold of 30000.",
        match: "full",
        confidence: "medium",
        estimatedGasSavings: 14_200,
      },
    ]);
  });

  it("should stay quiet at or below the threshold", () => {
    // Given: Exactly the threshold
    const op = opsFor("store");
    const fn = makeFunction({ name: "store", operations: [op.write("a")] });

    // When/Then: Nothing to report
    expect(run(detector, makeContract([fn]), { gasCostThreshold: 22_100 })).toEqual([]);
  });

  it("should report operations the cost table cannot price", () => {
    // Given: A host call missing from the table
    const hostCall: HostCallOp = {
      id: 1,
      kind: "host-call",
      name: "mystery_import",
      location: { file: "contract.wasm", line: 1, column: 88 },
    };
    const fn = makeFunction({ name: "func_0", operations: [hostCall] });

    // When: Inspecting
    const findings = run(detector, makeContract([fn], { dialect: "wasm" }));

    // Then: GAS-006 at the operation
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      ruleId: "GAS-006",
      location: hostCall.location,
      description: "No cost is known for 'host-call:mystery_import' in func_0; 700 gas was assumed.",
    });
  });
});

// ============================================================================
// Storage access
// ============================================================================

describe("StorageAccessDetector", () => {
  const detector = new StorageAccessDetector();

  it("should flag a second read of an unchanged slot", () => {
    // Given: total read twice
    const op = opsFor("ratio");
    const first = op.read("total");
    const second = op.read("total");
    const fn = makeFunction({ name: "ratio", operations: [first, second] });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: One finding at the repeated read, priced as a warm read
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ ruleId: "GAS-002", estimatedGasSavings: 100 });
    expect(findings[0]?.location).toEqual(second.location);
  });

  it("should not flag reads separated by a write or an external call", () => {
    // Given: read, write, read and read, call, read
    const a = opsFor("bump");
    const b = opsFor("sync");
    const model = makeContract([
      makeFunction({ name: "bump", operations: [a.read("count"), a.write("count"), a.read("count")] }),
      makeFunction({ name: "sync", operations: [b.read("price"), b.call(), b.read("price")] }),
    ]);

    // When/Then: Values may have changed in between
    expect(run(detector, model)).toEqual([]);
  });

  it("should flag loop-invariant reads and writes inside loops", () => {
    // Given: A loop reading fee and writing total on every iteration
    const op = opsFor("distribute");
    const loop = op.loop("parameter", { boundSource: "count" });
    const fn = makeFunction({
      name: "distribute",
      operations: [withBody(loop, [op.read("fee"), op.write("total")])],
    });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: Partial GAS-002 for fee and GAS-005 for total
    expect(findings.map((finding) => [finding.ruleId, finding.match, finding.estimatedGasSavings])).toEqual([
      ["GAS-002", "partial", 100],
      ["GAS-005", "full", 5_000],
    ]);
  });

  it("should not treat a slot the loop writes as invariant", () => {
    // Given: The loop reads and writes the same slot
    const op = opsFor("accumulate");
    const loop = op.loop("constant", { iterations: 4 });
    const fn = makeFunction({
      name: "accumulate",
      operations: [withBody(loop, [op.read("sum"), op.write("sum")])],
    });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: Only the write is reported
    expect(findings.map((finding) => finding.ruleId)).toEqual(["GAS-005"]);
  });
});

// ============================================================================
// Redundant calls
// ============================================================================

describe("RedundantCallDetector", () => {
  const detector = new RedundantCallDetector();

  it("should flag an identical call repeated on the same path", () => {
    // Given: balanceOf(owner) twice
    const op = opsFor("sync");
    const repeat = { selector: "balanceOf", arguments: "owner", method: "interface" as const };
    const fn = makeFunction({ name: "sync", operations: [op.call(repeat), op.call(repeat)] });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: Second call reported, saving one call
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      ruleId: "GAS-003",
      location: { line: 12 },
      description: "sync repeats the call balanceOf on token with the same arguments.",
      estimatedGasSavings: 2_600,
    });
  });

  it("should not flag calls separated by a storage write or carrying value", () => {
    // Given: A write between two calls, and two payments
    const a = opsFor("refresh");
    const b = opsFor("pay");
    const model = makeContract([
      makeFunction({ name: "refresh", operations: [a.call(), a.write("cache"), a.call()] }),
      makeFunction({
        name: "pay",
        operations: [b.call({ valueTransfer: true }), b.call({ valueTransfer: true })],
      }),
    ]);

    // When/Then: Nothing to report
    expect(run(detector, model)).toEqual([]);
  });

  it("should compare each branch arm against the calls before it", () => {
    // Given: A call, then the same call in one arm
    const op = opsFor("check");
    const first = op.call({ arguments: "x" });
    const branch = op.branch();
    const fn = makeFunction({
      name: "check",
      operations: [first, withArms(branch, [[op.call({ arguments: "x" })], [op.call({ arguments: "y" })]])],
    });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: Only the identical call in the first arm
    expect(findings.map((finding) => finding.location.line)).toEqual([13]);
  });
});

// ============================================================================
// Loops and memory
// ============================================================================

describe("UnboundedLoopDetector", () => {
  it("should grade loops by what bounds them", () => {
    // Given: Storage, parameter and constant bounds
    const op = opsFor("sweep");
    const fn = makeFunction({
      name: "sweep",
      operations: [
        op.loop("storage", { boundSource: "self.holders.len()" }),
        op.loop("parameter", { boundSource: "count" }),
        op.loop("constant", { iterations: 8 }),
      ],
    });

    // When: Inspecting
    const findings = run(new UnboundedLoopDetector(), makeContract([fn]));

    // Then: Full, then partial, constant ignored
    expect(findings.map((finding) => [finding.ruleId, finding.match])).toEqual([
      ["GAS-004", "full"],
      ["GAS-004", "partial"],
    ]);
    expect(findings[0]?.description).toBe(
      "Loop in sweep iterates over self.holders.len(), which grows with contract state and can exhaust the gas limit."
    );
  });
});

describe("MemoryAllocationDetector", () => {
  const detector = new MemoryAllocationDetector();

  it("should ignore functions without loops", () => {
    // Given: An allocation in straight-line code
    const op = opsFor("encode");
    const fn = makeFunction({ name: "encode", operations: [op.alloc("vec")] });

    // When/Then: Nothing to report
    expect(run(detector, makeContract([fn]))).toEqual([]);
  });

  it("should report allocations before and inside a loop", () => {
    // Given: A string before the loop, a vec inside, and a preallocated vec
    const op = opsFor("collect");
    const before = op.alloc("string");
    const loop = op.loop("constant", { iterations: 4 });
    const fn = makeFunction({
      name: "collect",
      operations: [before, withBody(loop, [op.alloc("vec"), op.alloc("vec", true)])],
    });

    // When: Inspecting
    const findings = run(detector, makeContract([fn]));

    // Then: Partial before, full inside, preallocation skipped
    expect(findings.map((finding) => [finding.match, finding.estimatedGasSavings])).toEqual([
      ["partial", 2_000],
      ["full", 2_000],
    ]);
    expect(findings[1]?.description).toBe(
      "collect allocates a vec without capacity inside a loop; each growth reallocates and copies."
    );
  });
});

// ============================================================================
// Contract size
// ============================================================================

describe("ContractSizeDetector", () => {
  const detector = new ContractSizeDetector();

  it("should skip models without an artifact", () => {
    expect(run(detector, makeContract([makeFunction({ name: "f" })]))).toEqual([]);
  });

  it("should not flag a small program", () => {
    // Given: A highly compressible artifact
    const model = makeContract([makeFunction({ name: "f" })], { dialect: "wasm", artifact: new Uint8Array(50_000) });

    // When/Then: Compresses far below the limit
    expect(compressedSize(new Uint8Array(50_000))).toBeLessThan(STYLUS_SIZE_LIMIT);
    expect(run(detector, model)).toEqual([]);
  });

  it("should report programs over the limit", () => {
    // Given: 40 KB of incompressible bytes
    const model = makeContract([makeFunction({ name: "f" })], { dialect: "wasm", artifact: noise(40_000) });

    // When: Inspecting
    const findings = run(detector, model);

    // Then: Full match at the start of the file
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ ruleId: "GAS-008", match: "full", location: { line: 1, column: 1 } });
  });

  it("should warn within 20% of the limit", () => {
    // Given: 22 KB of incompressible bytes
    const model = makeContract([makeFunction({ name: "f" })], { dialect: "wasm", artifact: noise(22_000) });

    // When: Inspecting
    const findings = run(detector, model);

    // Then: Partial match
    expect(findings.map((finding) => finding.match)).toEqual(["partial"]);
  });
});
