/**
 * Hand-built contract models for detector, scoring and engine tests.
 */

import { parseAnalysisOptions, type AnalysisOptions, type AnalysisOptionsInput } from "../../src/config/schema.js";
import { estimateCosts } from "../../src/gas/costEstimator.js";
import { DEFAULT_COST_TABLE } from "../../src/gas/costTable.js";
import { buildControlFlow } from "../../src/parser/cfg.js";
import {
  unwrap,
  type ArithmeticOp,
  type BranchOp,
  type ContractModel,
  type DetectorContext,
  type EmitOp,
  type EnvReadOp,
  type ExternalCallOp,
  type FunctionModel,
  type GuardOp,
  type LoopOp,
  type MemoryAllocOp,
  type Operation,
  type SourceLocation,
  type StorageReadOp,
  type StorageSlot,
  type StorageWriteOp,
  type TerminateOp,
  type UnsafeOp,
} from "../../src/types/index.js";

export const TEST_FILE = "src/lib.rs";

// ============================================================================
// Operations
// ============================================================================

/**
 * Operation factory for one function. Ids are handed out in call order, so
 * build nested operations (loop bodies, branch arms) after their parent.
 * Each operation sits on line 10 + id.
 */
export function opsFor(fnName: string, file = TEST_FILE) {
  let next = 1;
  const at = (): { id: number; location: SourceLocation } => {
    const id = next++;
    return { id, location: { file, line: 10 + id, column: 5, function: fnName } };
  };

  return {
    read: (slot: string, key?: string): StorageReadOp => ({
      ...at(),
      kind: "storage-read",
      slot,
      ...(key !== undefined ? { key } : {}),
    }),
    write: (
      slot: string,
      extra: { key?: string; keyRefs?: string[]; valueRefs?: string[] } = {}
    ): StorageWriteOp => ({
      ...at(),
      kind: "storage-write",
      slot,
      ...(extra.key !== undefined ? { key: extra.key } : {}),
      keyRefs: extra.keyRefs ?? [],
      valueRefs: extra.valueRefs ?? [],
    }),
    call: (extra: Partial<Omit<ExternalCallOp, "id" | "location" | "kind">> = {}): ExternalCallOp => {
      const base = at();
      return {
        ...base,
        kind: "external-call",
        callSite: `${fnName}#${base.id}`,
        target: "token",
        targetKind: "storage",
        method: "call",
        arguments: "",
        valueTransfer: false,
        resultChecked: true,
        validated: false,
        ...extra,
      };
    },
    arith: (extra: Partial<Omit<ArithmeticOp, "id" | "location" | "kind">> = {}): ArithmeticOp => ({
      ...at(),
      kind: "arithmetic",
      operator: "+",
      checked: false,
      operands: ["a", "b"],
      usage: "balance",
      ...extra,
    }),
    alloc: (allocation: MemoryAllocOp["allocation"], preallocated = false): MemoryAllocOp => ({
      ...at(),
      kind: "memory-alloc",
      allocation,
      preallocated,
    }),
    /** Reserves the loop's id; fill the body with operations built afterwards. */
    loop: (bound: LoopOp["bound"], extra: { iterations?: number; boundSource?: string } = {}): LoopOp => ({
      ...at(),
      kind: "loop",
      bound,
      ...(extra.iterations !== undefined ? { iterations: extra.iterations } : {}),
      ...(extra.boundSource !== undefined ? { boundSource: extra.boundSource } : {}),
      body: [],
    }),
    branch: (condition = "cond"): BranchOp => ({ ...at(), kind: "branch", condition, arms: [] }),
    guard: (guard: GuardOp["guard"], condition = "check"): GuardOp => ({
      ...at(),
      kind: "guard",
      guard,
      condition,
    }),
    emit: (event = "Updated"): EmitOp => ({ ...at(), kind: "emit", event }),
    env: (variable: EnvReadOp["variable"], inCondition = false): EnvReadOp => ({
      ...at(),
      kind: "env-read",
      variable,
      inCondition,
    }),
    unsafe: (reason: UnsafeOp["reason"]): UnsafeOp => ({ ...at(), kind: "unsafe", reason }),
    terminate: (reason: TerminateOp["reason"] = "return"): TerminateOp => ({
      ...at(),
      kind: "terminate",
      reason,
    }),
  };
}

/** Give a loop its body without mutating the original. */
export function withBody(loop: LoopOp, body: Operation[]): LoopOp {
  return { ...loop, body };
}

export function withArms(branch: BranchOp, arms: Operation[][]): BranchOp {
  return { ...branch, arms };
}

// ============================================================================
// Functions and contracts
// ============================================================================

export type FunctionFields = Partial<Omit<FunctionModel, "controlFlow">> & { name: string };

export function makeFunction(fields: FunctionFields): FunctionModel {
  const operations = fields.operations ?? [];
  return {
    visibility: "public",
    mutability: "nonpayable",
    parameters: [],
    modifiers: [],
    isConstructor: false,
    location: { file: TEST_FILE, line: 10, column: 5, function: fields.name },
    ...fields,
    operations,
    controlFlow: buildControlFlow(operations),
  };
}

export function makeSlot(name: string, typeClass: StorageSlot["typeClass"] = "value"): StorageSlot {
  return {
    name,
    declaredType: typeClass === "mapping" ? "mapping(address => uint256)" : "uint256",
    typeClass,
    access: "read-write",
    readers: [],
    writers: [],
    location: { file: TEST_FILE, line: 3, column: 9 },
  };
}

export function makeContract(functions: FunctionModel[], overrides: Partial<ContractModel> = {}): ContractModel {
  return {
    name: "Vault",
    dialect: "stylus",
    file: TEST_FILE,
    functions,
    storage: [],
    constants: [],
    externalCalls: [],
    sourceMap: {},
    diagnostics: [],
    metrics: { lines: 40, byteLength: 1200 },
    ...overrides,
  };
}

// ============================================================================
// Detector context
// ============================================================================

export function testOptions(input: AnalysisOptionsInput = {}): AnalysisOptions {
  return unwrap(parseAnalysisOptions(input));
}

/** Context as the pipeline would build it, without deadlines. */
export function makeContext(model: ContractModel, input: AnalysisOptionsInput = {}): DetectorContext {
  const config = testOptions(input);
  const controller = new AbortController();
  return {
    config,
    costs: estimateCosts(model, DEFAULT_COST_TABLE, config),
    costTable: DEFAULT_COST_TABLE,
    signal: controller.signal,
    throwIfAborted: () => controller.signal.throwIfAborted(),
  };
}
