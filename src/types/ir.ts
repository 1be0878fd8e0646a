/**
 * Contract Intermediate Representation
 *
 * Dialect-neutral model produced by the builder and read by every detector.
 * Models are deep-frozen once built.
 */

import type {
  Diagnostic,
  Dialect,
  SourceLocation,
  StateMutability,
  Visibility,
} from "./index.js";

// ============================================================================
// Operations
// ============================================================================

interface OperationBase {
  /** Function-local id, assigned in evaluation order starting at 1 */
  id: number;
  location: SourceLocation;
}

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%" | "**";

/** What the result of an arithmetic expression feeds into. */
export type ArithmeticUsage = "index" | "balance" | "value";

export interface ArithmeticOp extends OperationBase {
  kind: "arithmetic";
  operator: ArithmeticOperator;
  checked: boolean;
  operands: string[];
  target?: string;
  usage: ArithmeticUsage;
}

export type StorageAccess = "cold" | "warm";

/** Slot name for storage accesses whose slot cannot be resolved statically. */
export const UNKNOWN_SLOT = "*";

export interface StorageReadOp extends OperationBase {
  kind: "storage-read";
  slot: string;
  key?: string;
}

export interface StorageWriteOp extends OperationBase {
  kind: "storage-write";
  slot: string;
  key?: string;
  /** Identifiers referenced by the key expression */
  keyRefs: string[];
  /** Identifiers referenced by the written value */
  valueRefs: string[];
}

export type CallMethod = "call" | "static-call" | "delegate-call" | "transfer" | "interface";

export type CallTargetKind = "msg-sender" | "parameter" | "storage" | "constant" | "computed";

export interface ExternalCallOp extends OperationBase {
  kind: "external-call";
  callSite: string;
  target: string;
  targetKind: CallTargetKind;
  method: CallMethod;
  /** Interface method name or raw call flavour */
  selector?: string;
  arguments: string;
  valueTransfer: boolean;
  resultChecked: boolean;
  /** Target compared against an allow-list or fixed address before the call */
  validated: boolean;
}

export type AllocationKind = "vec" | "string" | "box" | "bytes" | "array" | "clone" | "memory";

export interface MemoryAllocOp extends OperationBase {
  kind: "memory-alloc";
  allocation: AllocationKind;
  preallocated: boolean;
}

/** How the iteration count of a loop is bounded. */
export type LoopBound = "constant" | "parameter" | "storage" | "unbounded";

export interface LoopOp extends OperationBase {
  kind: "loop";
  bound: LoopBound;
  /** Literal iteration count when the bound is a constant */
  iterations?: number;
  boundSource?: string;
  body: Operation[];
}

export interface BranchOp extends OperationBase {
  kind: "branch";
  condition: string;
  /** One entry per arm; an absent else is an empty arm */
  arms: Operation[][];
}

export type GuardKind = "access-control" | "reentrancy" | "validation";

export interface GuardOp extends OperationBase {
  kind: "guard";
  guard: GuardKind;
  condition: string;
}

export interface EmitOp extends OperationBase {
  kind: "emit";
  event: string;
}

export type EnvironmentVariable =
  | "msg-sender"
  | "msg-value"
  | "tx-origin"
  | "block-timestamp"
  | "block-number";

export interface EnvReadOp extends OperationBase {
  kind: "env-read";
  variable: EnvironmentVariable;
  inCondition: boolean;
}

export type UnsafeReason =
  | "unsafe-block"
  | "raw-pointer"
  | "transmute"
  | "uninitialized-memory"
  | "manual-memory"
  | "inline-assembly"
  | "selfdestruct";

export interface UnsafeOp extends OperationBase {
  kind: "unsafe";
  reason: UnsafeReason;
}

export interface TerminateOp extends OperationBase {
  kind: "terminate";
  reason: "return" | "revert";
}

/** Host function invoked by a compiled artifact that maps to no other kind. */
export interface HostCallOp extends OperationBase {
  kind: "host-call";
  name: string;
}

export type Operation =
  | ArithmeticOp
  | StorageReadOp
  | StorageWriteOp
  | ExternalCallOp
  | MemoryAllocOp
  | LoopOp
  | BranchOp
  | GuardOp
  | EmitOp
  | EnvReadOp
  | UnsafeOp
  | TerminateOp
  | HostCallOp;

export type OperationKind = Operation["kind"];

// ============================================================================
// Control flow
// ============================================================================

export type ControlFlowEdgeKind =
  | "sequential"
  | "branch"
  | "loop-body"
  | "loop-back"
  | "loop-exit"
  | "revert"
  | "return";

export interface ControlFlowEdge {
  from: number;
  to: number;
  kind: ControlFlowEdgeKind;
}

/**
 * One node per operation (keyed by operation id) plus a synthetic entry (0)
 * and exit node.
 */
export interface ControlFlowGraph {
  entry: number;
  exit: number;
  nodes: number[];
  edges: ControlFlowEdge[];
}

// ============================================================================
// Declarations
// ============================================================================

export interface Parameter {
  name: string;
  type: string;
}

export type ModifierKind = "access-control" | "reentrancy-guard" | "other";

export interface ModifierRef {
  name: string;
  kind: ModifierKind;
}

export interface FunctionModel {
  name: string;
  visibility: Visibility;
  mutability: StateMutability;
  parameters: Parameter[];
  returns?: string;
  modifiers: ModifierRef[];
  documentation?: string;
  isConstructor: boolean;
  operations: Operation[];
  controlFlow: ControlFlowGraph;
  location: SourceLocation;
}

export type StorageTypeClass = "value" | "mapping" | "array";

export type StorageAccessPattern = "unused" | "read-only" | "write-only" | "read-write";

export interface StorageSlot {
  name: string;
  declaredType: string;
  typeClass: StorageTypeClass;
  access: StorageAccessPattern;
  readers: string[];
  writers: string[];
  location: SourceLocation;
}

export interface ExternalCallSite {
  id: string;
  function: string;
  target: string;
  targetKind: CallTargetKind;
  method: CallMethod;
  valueTransfer: boolean;
  validated: boolean;
  resultChecked: boolean;
  location: SourceLocation;
}

/** Named compile-time constant; not a storage slot. */
export interface ConstantDeclaration {
  name: string;
  location: SourceLocation;
}

export interface ContractMetrics {
  lines: number;
  byteLength: number;
}

export interface ContractModel {
  name: string;
  dialect: Dialect;
  file: string;
  functions: FunctionModel[];
  storage: StorageSlot[];
  constants: ConstantDeclaration[];
  externalCalls: ExternalCallSite[];
  /** Symbol ("fn:name", "storage:name") to location */
  sourceMap: Record<string, SourceLocation>;
  diagnostics: Diagnostic[];
  metrics: ContractMetrics;
  /**
   * Raw bytes for compiled artifacts, used by size checks. Built models return
   * a fresh copy on each read; writing to it leaves the model unchanged.
   */
  artifact?: Uint8Array;
}
