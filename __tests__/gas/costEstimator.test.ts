/**
 * Cost Estimator Tests
 *
 * Tests for pricing operation trees against the instruction cost table
 * using Given-When-Then pattern.
 */

import { describe, it, expect } from "vitest";
import { estimateCosts } from "../../src/gas/costEstimator.js";
import { DEFAULT_COST_TABLE, INK_PER_GAS, costKey, createCostTable } from "../../src/gas/costTable.js";
import { UNKNOWN_SLOT, type HostCallOp } from "../../src/types/index.js";
import { makeContract, makeFunction, opsFor, testOptions, withArms, withBody } from "../helpers/models.js";

const options = testOptions();

describe("estimateCosts", () => {
  // ==========================================================================
  // Storage
  // ==========================================================================

  describe("storage", () => {
    it("should price N writes to distinct slots at N cold writes", () => {
      // Given: A function writing three different slots
      const op = opsFor("configure");
      const fn = makeFunction({ name: "configure", operations: [op.write("a"), op.write("b"), op.write("c")] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Each write is cold
      expect(report.functions[0]?.gas).toBe(3 * 22_100);
      expect(report.functions[0]?.ink).toBe(3 * 22_100 * INK_PER_GAS);
      expect(report.totalGas).toBe(66_300);
    });

    it("should price the second access of a slot as warm", () => {
      // Given: Two reads of the same slot and key
      const op = opsFor("balanceOf");
      const fn = makeFunction({ name: "balanceOf", operations: [op.read("balances", "owner"), op.read("balances", "owner")] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Cold then warm
      expect(report.functions[0]?.gas).toBe(2_100 + 100);
      expect(report.functions[0]?.operations.map((cost) => cost.costKey)).toEqual([
        "storage-read:cold",
        "storage-read:warm",
      ]);
    });

    it("should treat different keys of one mapping as separate slots", () => {
      // Given: Reads of two keys
      const op = opsFor("compare");
      const fn = makeFunction({ name: "compare", operations: [op.read("balances", "from"), op.read("balances", "to")] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Both cold
      expect(report.functions[0]?.gas).toBe(4_200);
    });

    it("should always price unresolved slots as cold", () => {
      // Given: Two writes whose slot is unknown
      const op = opsFor("poke");
      const fn = makeFunction({ name: "poke", operations: [op.write(UNKNOWN_SLOT), op.write(UNKNOWN_SLOT)] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Neither warms the other
      expect(report.functions[0]?.gas).toBe(44_200);
    });
  });

  // ==========================================================================
  // Control flow
  // ==========================================================================

  describe("loops", () => {
    it("should multiply the loop body by its literal bound", () => {
      // Given: A loop of three iterations writing one slot
      const op = opsFor("fill");
      const loop = op.loop("constant", { iterations: 3 });
      const fn = makeFunction({ name: "fill", operations: [withBody(loop, [op.write("total")])] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: 3 x overhead + one cold write + two warm writes
      expect(report.functions[0]?.gas).toBe(3 * 10 + 22_100 + 2 * 5_000);
    });

    it("should assume the configured iteration count for unbounded loops", () => {
      // Given: A loop without a literal bound and the default assumption of 10
      const op = opsFor("sum");
      const loop = op.loop("parameter", { boundSource: "n" });
      const fn = makeFunction({ name: "sum", operations: [withBody(loop, [op.arith()])] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: 10 x (overhead + arithmetic)
      expect(report.functions[0]?.gas).toBe(10 * 10 + 10 * 3);
    });

    it("should charge only the overhead of a zero-iteration loop", () => {
      // Given: A loop that never runs
      const op = opsFor("noop");
      const loop = op.loop("constant", { iterations: 0 });
      const fn = makeFunction({ name: "noop", operations: [withBody(loop, [op.write("x")])] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Body is free
      expect(report.functions[0]?.gas).toBe(10);
    });

    it("should cap a huge literal bound", () => {
      // Given: A loop claiming a trillion iterations
      const op = opsFor("spin");
      const loop = op.loop("constant", { iterations: 1_000_000_000_000 });
      const fn = makeFunction({ name: "spin", operations: [withBody(loop, [op.arith()])] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Priced as a million iterations
      expect(report.functions[0]?.gas).toBe(1_000_000 * 10 + 1_000_000 * 3);
    });

    it("should keep nested loop totals within the safe-integer range", () => {
      // Given: Three nested loops of a trillion iterations each
      const op = opsFor("cube");
      const inner = withBody(op.loop("constant", { iterations: 1_000_000_000_000 }), [op.arith()]);
      const middle = withBody(op.loop("constant", { iterations: 1_000_000_000_000 }), [inner]);
      const outer = withBody(op.loop("constant", { iterations: 1_000_000_000_000 }), [middle]);
      const fn = makeFunction({ name: "cube", operations: [outer] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Saturated, never unsafe
      expect(report.functions[0]?.gas).toBe(Number.MAX_SAFE_INTEGER);
      expect(report.functions[0]?.ink).toBe(Number.MAX_SAFE_INTEGER);
      expect(report.totalGas).toBe(Number.MAX_SAFE_INTEGER);
      expect(Number.isSafeInteger(report.totalInk)).toBe(true);
    });
  });

  describe("branches", () => {
    it("should charge the most expensive arm and warm every arm's slots", () => {
      // Given: Arms writing a and reading b, then a read of a
      const op = opsFor("route");
      const branch = op.branch("flag");
      const arms = [[op.write("a")], [op.read("b")]];
      const fn = makeFunction({ name: "route", operations: [withArms(branch, arms), op.read("a")] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Branch overhead + cold write + warm read
      expect(report.functions[0]?.gas).toBe(10 + 22_100 + 100);
    });
  });

  // ==========================================================================
  // Table coverage
  // ==========================================================================

  describe("unestimated operations", () => {
    it("should fall back to the default cost and record the operation", () => {
      // Given: A table that knows only cold reads
      const table = createCostTable({ "storage-read:cold": { gas: 2_100, environmentalWeight: 1 } });
      const op = opsFor("notify");
      const fn = makeFunction({ name: "notify", operations: [op.read("x"), op.emit("Notified")] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), table, options);

      // Then: The emit costs the default and is listed
      expect(report.functions[0]?.gas).toBe(2_100 + 700);
      expect(report.functions[0]?.operations[1]?.estimated).toBe(false);
      expect(report.unestimated).toEqual([
        {
          function: "notify",
          operationId: 2,
          costKey: "emit",
          location: { file: "src/lib.rs", line: 12, column: 5, function: "notify" },
        },
      ]);
    });

    it("should price known host calls by name", () => {
      // Given: A decoded host call
      const hostCall: HostCallOp = {
        id: 1,
        kind: "host-call",
        name: "native_keccak256",
        location: { file: "contract.wasm", line: 1, column: 120 },
      };
      const fn = makeFunction({ name: "func_3", operations: [hostCall] });

      // When: Estimating
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: Table price, nothing unestimated
      expect(costKey(hostCall)).toBe("host-call:native_keccak256");
      expect(report.functions[0]?.gas).toBe(36);
      expect(report.unestimated).toEqual([]);
    });
  });

  // ==========================================================================
  // Totals
  // ==========================================================================

  describe("totals", () => {
    it("should weight the environmental estimate by operation kind", () => {
      // Given: One cold write (weight 1.5)
      const op = opsFor("store");
      const fn = makeFunction({ name: "store", operations: [op.write("x")] });

      // When: Estimating with the default coefficient
      const report = estimateCosts(makeContract([fn]), DEFAULT_COST_TABLE, options);

      // Then: 22100 x 1.5 x 2e-7 kg
      expect(report.environmentalImpact).toBeCloseTo(0.00663, 9);
    });

    it("should sum functions and be deterministic", () => {
      // Given: Two functions
      const a = opsFor("a");
      const b = opsFor("b");
      const model = makeContract([
        makeFunction({ name: "a", operations: [a.read("x")] }),
        makeFunction({ name: "b", operations: [b.env("msg-sender"), b.emit()] }),
      ]);

      // When: Estimating twice
      const first = estimateCosts(model, DEFAULT_COST_TABLE, options);
      const second = estimateCosts(model, DEFAULT_COST_TABLE, options);

      // Then: Totals add up and reruns are identical
      expect(first.totalGas).toBe(2_100 + 2 + 1_500);
      expect(first.totalInk).toBe(first.totalGas * INK_PER_GAS);
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });
  });
});
