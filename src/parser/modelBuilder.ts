/**
 * Contract Model Builder
 *
 * Entry point of the front ends: detects the input dialect, runs the
 * matching parser and derives what every detector shares (control-flow
 * graphs, storage access patterns, external call sites, the source map).
 * The returned model is deep-frozen.
 */

import {
  err,
  ok,
  type ContractModel,
  type Dialect,
  type DialectHint,
  type ExternalCallSite,
  type FunctionModel,
  type ParseError,
  type Result,
  type SourceLocation,
  type StorageAccessPattern,
  type StorageSlot,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import { buildControlFlow } from "./cfg.js";
import { fatalParseError, type ParsedContract, type StorageDeclaration } from "./frontend.js";
import { operationsOfKind } from "./operations.js";
import { parseSolidity } from "./solidityParser.js";
import { parseStylus } from "./stylusParser.js";
import { isWasm, parseWasm } from "./wasmDecoder.js";

const log = logger.child({ component: "model-builder" });

export interface BuildOptions {
  /** Input dialect; "auto" (the default) sniffs the input */
  dialect?: DialectHint;
  /** Label used in every location; defaults to "<input>" */
  file?: string;
}

export const DEFAULT_FILE_LABEL = "<input>";

const SOLIDITY_MARKERS = /pragma\s+solidity|^\s*(abstract\s+)?(contract|library|interface)\s+\w+[^{;]*\{/m;

// ============================================================================
// Dialect detection
// ============================================================================

export function detectDialect(source: string | Uint8Array): Dialect {
  if (typeof source !== "string") {
    return isWasm(source) ? "wasm" : detectDialect(Buffer.from(source).toString("utf8"));
  }
  if (source.startsWith("\0asm")) return "wasm";
  return SOLIDITY_MARKERS.test(source) ? "solidity" : "stylus";
}

// ============================================================================
// Derived structure
// ============================================================================

function accessPattern(readers: readonly string[], writers: readonly string[]): StorageAccessPattern {
  if (readers.length > 0 && writers.length > 0) return "read-write";
  if (readers.length > 0) return "read-only";
  if (writers.length > 0) return "write-only";
  return "unused";
}

function storageSlots(declarations: readonly StorageDeclaration[], functions: readonly FunctionModel[]): StorageSlot[] {
  return declarations.map((decl) => {
    const readers = functions
      .filter((fn) => operationsOfKind(fn, "storage-read").some((op) => op.slot === decl.name))
      .map((fn) => fn.name);
    const writers = functions
      .filter((fn) => operationsOfKind(fn, "storage-write").some((op) => op.slot === decl.name))
      .map((fn) => fn.name);
    return {
      name: decl.name,
      declaredType: decl.declaredType,
      typeClass: decl.typeClass,
      access: accessPattern(readers, writers),
      readers,
      writers,
      location: decl.location,
    };
  });
}

function callSites(functions: readonly FunctionModel[]): ExternalCallSite[] {
  return functions.flatMap((fn) =>
    operationsOfKind(fn, "external-call").map((op) => ({
      id: op.callSite,
      function: fn.name,
      target: op.target,
      targetKind: op.targetKind,
      method: op.method,
      valueTransfer: op.valueTransfer,
      validated: op.validated,
      resultChecked: op.resultChecked,
      location: op.location,
    }))
  );
}

function sourceMap(parsed: ParsedContract, functions: readonly FunctionModel[]): Record<string, SourceLocation> {
  const map: Record<string, SourceLocation> = {};
  for (const slot of parsed.storage) map[`storage:${slot.name}`] = slot.location;
  for (const constant of parsed.constants) map[`const:${constant.name}`] = constant.location;
  for (const fn of functions) {
    const key = `fn:${fn.name}`;
    // Overloads keep the first declaration.
    if (map[key] === undefined) map[key] = fn.location;
  }
  return map;
}

/**
 * Recursively freeze a plain object graph. Typed arrays cannot be frozen
 * while they hold elements and are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return Object.freeze(value);
}

function assemble(
  parsed: ParsedContract,
  dialect: Dialect,
  file: string,
  metrics: ContractModel["metrics"],
  artifact?: Uint8Array
): ContractModel {
  const functions: FunctionModel[] = parsed.functions.map((fn) => ({
    ...fn,
    controlFlow: buildControlFlow(fn.operations),
  }));

  const model: ContractModel = {
    name: parsed.name,
    dialect,
    file,
    functions,
    storage: storageSlots(parsed.storage, functions),
    constants: parsed.constants,
    externalCalls: callSites(functions),
    sourceMap: sourceMap(parsed, functions),
    diagnostics: parsed.diagnostics,
    metrics,
  };
  if (artifact === undefined) return model;
  // Typed arrays cannot be frozen, so every read hands out a copy.
  return Object.defineProperty(model, "artifact", { enumerable: true, get: () => artifact.slice() });
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Build the immutable contract model for one input.
 *
 * @example
 * ```ts
 * const built = buildModel(source, { file: "src/lib.rs" });
 * if (built.ok) {
 *   console.log(built.value.functions.map((fn) => fn.name));
 * }
 * ```
 */
export function buildModel(source: string | Uint8Array, options: BuildOptions = {}): Result<ContractModel, ParseError> {
  const file = options.file ?? DEFAULT_FILE_LABEL;
  const hint = options.dialect ?? "auto";
  const dialect = hint === "auto" ? detectDialect(source) : hint;

  let parsed: Result<ParsedContract, ParseError>;
  let metrics: ContractModel["metrics"];
  let artifact: Uint8Array | undefined;

  if (dialect === "wasm") {
    const bytes = typeof source === "string" ? Buffer.from(source, "latin1") : source;
    parsed = parseWasm(bytes, file);
    metrics = { lines: 1, byteLength: bytes.length };
    artifact = Uint8Array.from(bytes);
  } else {
    const text = typeof source === "string" ? source : Buffer.from(source).toString("utf8");
    if (text.trim().length === 0) {
      return err(fatalParseError("Empty input", [], { file, line: 1, column: 1 }));
    }
    parsed = dialect === "solidity" ? parseSolidity(text, file) : parseStylus(text, file);
    metrics = { lines: text.split("\n").length, byteLength: Buffer.byteLength(text, "utf8") };
  }

  if (!parsed.ok) {
    log.warn("Failed to build contract model", { file, dialect, error: parsed.error.message });
    return parsed;
  }

  const model = assemble(parsed.value, dialect, file, metrics, artifact);
  log.debug("Built contract model", {
    file,
    dialect,
    contract: model.name,
    functions: model.functions.length,
    diagnostics: model.diagnostics.length,
  });
  return ok(deepFreeze(model));
}
