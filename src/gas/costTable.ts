/**
 * Instruction Cost Table
 *
 * Process-wide, frozen mapping from cost keys to a base gas cost and an
 * environmental weight. A cost key is the operation kind plus the operand
 * characteristics that change its price, e.g. `storage-write:cold` or
 * `external-call:value`.
 */

import type { Operation } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface CostEntry {
  /** Gas for one execution */
  gas: number;
  /** Multiplier applied to gas for the environmental estimate */
  environmentalWeight: number;
}

export interface InstructionCostTable {
  lookup(key: string): CostEntry | undefined;
  has(key: string): boolean;
  keys(): string[];
}

export type StorageTemperature = "cold" | "warm";

// ============================================================================
// Defaults
// ============================================================================

/** Stylus ink per unit of EVM gas. */
export const INK_PER_GAS = 10_000;

const STORAGE_WRITE_WEIGHT = 1.5;
const EXTERNAL_CALL_WEIGHT = 1.2;

function entry(gas: number, environmentalWeight = 1): CostEntry {
  return { gas, environmentalWeight };
}

const DEFAULT_COSTS: Record<string, CostEntry> = {
  "storage-read:cold": entry(2_100),
  "storage-read:warm": entry(100),
  "storage-write:cold": entry(22_100, STORAGE_WRITE_WEIGHT),
  "storage-write:warm": entry(5_000, STORAGE_WRITE_WEIGHT),
  "external-call": entry(2_600, EXTERNAL_CALL_WEIGHT),
  "external-call:value": entry(11_600, EXTERNAL_CALL_WEIGHT),
  "external-call:delegate": entry(2_600, EXTERNAL_CALL_WEIGHT),
  "external-call:static": entry(2_600, EXTERNAL_CALL_WEIGHT),
  arithmetic: entry(3),
  "arithmetic:checked": entry(20),
  "memory-alloc": entry(200),
  "memory-alloc:preallocated": entry(100),
  loop: entry(10),
  branch: entry(10),
  guard: entry(20),
  emit: entry(1_500),
  "env-read": entry(2),
  unsafe: entry(0),
  terminate: entry(0),
  // Stylus host functions without a dedicated operation kind
  "host-call:read_args": entry(100),
  "host-call:write_result": entry(100),
  "host-call:storage_flush_cache": entry(500, STORAGE_WRITE_WEIGHT),
  "host-call:pay_for_memory_grow": entry(100),
  "host-call:native_keccak256": entry(36),
  "host-call:account_balance": entry(2_600),
  "host-call:account_code": entry(2_600),
  "host-call:account_code_size": entry(2_600),
  "host-call:account_codehash": entry(2_600),
  "host-call:read_return_data": entry(100),
  "host-call:return_data_size": entry(2),
  "host-call:msg_reentrant": entry(2),
  "host-call:evm_gas_left": entry(2),
  "host-call:evm_ink_left": entry(2),
  "host-call:chainid": entry(2),
  "host-call:contract_address": entry(2),
  "host-call:create1": entry(32_000, EXTERNAL_CALL_WEIGHT),
  "host-call:create2": entry(32_000, EXTERNAL_CALL_WEIGHT),
};

// ============================================================================
// Table
// ============================================================================

export function createCostTable(entries: Record<string, CostEntry>): InstructionCostTable {
  const table = new Map<string, CostEntry>(
    Object.entries(entries).map(([key, value]) => [key, Object.freeze({ ...value })])
  );
  return Object.freeze({
    lookup: (key: string) => table.get(key),
    has: (key: string) => table.has(key),
    keys: () => [...table.keys()].sort(),
  });
}

export const DEFAULT_COST_TABLE: InstructionCostTable = createCostTable(DEFAULT_COSTS);

/**
 * Cost key of one execution of `op`. Storage accesses need the temperature
 * of their slot at that point.
 */
export function costKey(op: Operation, temperature: StorageTemperature = "cold"): string {
  switch (op.kind) {
    case "storage-read":
    case "storage-write":
      return `${op.kind}:${temperature}`;
    case "external-call":
      if (op.method === "delegate-call") return "external-call:delegate";
      if (op.method === "static-call") return "external-call:static";
      return op.valueTransfer ? "external-call:value" : "external-call";
    case "arithmetic":
      return op.checked ? "arithmetic:checked" : "arithmetic";
    case "memory-alloc":
      return op.preallocated ? "memory-alloc:preallocated" : "memory-alloc";
    case "host-call":
      return `host-call:${op.name}`;
    default:
      return op.kind;
  }
}
