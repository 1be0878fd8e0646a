/**
 * Instruction Cost Table Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_COST_TABLE, costKey, createCostTable } from "../../src/gas/costTable.js";
import { opsFor } from "../helpers/models.js";

describe("DEFAULT_COST_TABLE", () => {
  it("should price cold storage above warm storage", () => {
    // Given/When: Looking up storage keys
    const coldWrite = DEFAULT_COST_TABLE.lookup("storage-write:cold");
    const warmWrite = DEFAULT_COST_TABLE.lookup("storage-write:warm");

    // Then: EVM-equivalent prices
    expect(coldWrite).toEqual({ gas: 22_100, environmentalWeight: 1.5 });
    expect(warmWrite?.gas).toBe(5_000);
    expect(DEFAULT_COST_TABLE.lookup("storage-read:cold")?.gas).toBe(2_100);
  });

  it("should return undefined for unknown keys", () => {
    expect(DEFAULT_COST_TABLE.lookup("selfdestruct")).toBeUndefined();
    expect(DEFAULT_COST_TABLE.has("selfdestruct")).toBe(false);
  });

  it("should be immutable", () => {
    // Given: An entry from the shared table
    const entry = DEFAULT_COST_TABLE.lookup("arithmetic");

    // Then: Neither the table nor its entries can be changed
    expect(Object.isFrozen(DEFAULT_COST_TABLE)).toBe(true);
    expect(Object.isFrozen(entry)).toBe(true);
  });
});

describe("createCostTable", () => {
  it("should copy its input and list keys in sorted order", () => {
    // Given: A mutable source record
    const source = { b: { gas: 2, environmentalWeight: 1 }, a: { gas: 1, environmentalWeight: 1 } };

    // When: Building a table and changing the source afterwards
    const table = createCostTable(source);
    source.a.gas = 99;

    // Then: The table keeps the original value
    expect(table.keys()).toEqual(["a", "b"]);
    expect(table.lookup("a")?.gas).toBe(1);
  });
});

describe("costKey", () => {
  const op = opsFor("f");

  it("should key storage by temperature", () => {
    expect(costKey(op.read("x"))).toBe("storage-read:cold");
    expect(costKey(op.write("x"), "warm")).toBe("storage-write:warm");
  });

  it("should distinguish call flavours", () => {
    expect(costKey(op.call())).toBe("external-call");
    expect(costKey(op.call({ valueTransfer: true }))).toBe("external-call:value");
    expect(costKey(op.call({ method: "delegate-call", valueTransfer: true }))).toBe("external-call:delegate");
    expect(costKey(op.call({ method: "static-call" }))).toBe("external-call:static");
  });

  it("should distinguish checked arithmetic and preallocation", () => {
    expect(costKey(op.arith({ checked: true }))).toBe("arithmetic:checked");
    expect(costKey(op.arith())).toBe("arithmetic");
    expect(costKey(op.alloc("vec", true))).toBe("memory-alloc:preallocated");
    expect(costKey(op.alloc("vec"))).toBe("memory-alloc");
  });

  it("should use the kind for everything else", () => {
    expect(costKey(op.emit())).toBe("emit");
    expect(costKey(op.guard("validation"))).toBe("guard");
  });
});
