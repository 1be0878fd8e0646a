/**
 * WASM Front End
 *
 * Decodes a compiled Stylus module. Host imports from `vm_hooks` are mapped
 * onto IR operations; structured control flow (`loop`, `if`/`else`) becomes
 * loop and branch operations. Locations use line 1 and the 1-based byte
 * offset of the instruction as column.
 */

import { basename, extname } from "path";
import {
  UNKNOWN_SLOT,
  err,
  ok,
  type BranchOp,
  type CallMethod,
  type Diagnostic,
  type EnvironmentVariable,
  type LoopOp,
  type Operation,
  type Parameter,
  type ParseError,
  type Result,
  type SourceLocation,
} from "../types/index.js";
import { fatalParseError, parseDiagnostic, type ParsedContract, type ParsedFunction } from "./frontend.js";

// ============================================================================
// Constants
// ============================================================================

export const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d] as const;

const SECTION = {
  custom: 0,
  type: 1,
  import: 2,
  function: 3,
  export: 7,
  code: 10,
} as const;

const VALTYPES: Record<number, string> = {
  0x7f: "i32",
  0x7e: "i64",
  0x7d: "f32",
  0x7c: "f64",
  0x7b: "v128",
  0x70: "funcref",
  0x6f: "externref",
};

const ARITHMETIC_OPCODES: Record<number, "+" | "-" | "*" | "/" | "%"> = {
  0x6a: "+", 0x6b: "-", 0x6c: "*", 0x6d: "/", 0x6e: "/", 0x6f: "%", 0x70: "%",
  0x7c: "+", 0x7d: "-", 0x7e: "*", 0x7f: "/", 0x80: "/", 0x81: "%", 0x82: "%",
};

const HOOK_ENV: Record<string, EnvironmentVariable> = {
  msg_sender: "msg-sender",
  msg_value: "msg-value",
  tx_origin: "tx-origin",
  block_timestamp: "block-timestamp",
  block_number: "block-number",
};

const HOOK_CALLS: Record<string, CallMethod> = {
  call_contract: "call",
  delegate_call_contract: "delegate-call",
  static_call_contract: "static-call",
};

const OP_DROP = 0x1a;

// ============================================================================
// Byte reader
// ============================================================================

class DecodeError extends Error {
  constructor(
    message: string,
    readonly offset: number
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

class ByteReader {
  constructor(
    private readonly bytes: Uint8Array,
    public pos: number,
    private readonly end: number
  ) {}

  get done(): boolean {
    return this.pos >= this.end;
  }

  u8(): number {
    const byte = this.bytes[this.pos];
    if (byte === undefined || this.pos >= this.end) {
      throw new DecodeError("unexpected end of data", this.pos);
    }
    this.pos++;
    return byte;
  }

  peek(): number | undefined {
    return this.pos < this.end ? this.bytes[this.pos] : undefined;
  }

  /** Unsigned LEB128, at most 32 bits. */
  u32(): number {
    let result = 0;
    let shift = 0;
    for (;;) {
      const byte = this.u8();
      result += (byte & 0x7f) * 2 ** shift;
      if ((byte & 0x80) === 0) return result;
      shift += 7;
      if (shift > 28) throw new DecodeError("LEB128 value too long", this.pos);
    }
  }

  /** Skip a signed LEB128 of up to `maxBytes` bytes. */
  skipSigned(maxBytes: number): void {
    for (let i = 0; i < maxBytes; i++) {
      if ((this.u8() & 0x80) === 0) return;
    }
    throw new DecodeError("LEB128 value too long", this.pos);
  }

  skip(count: number): void {
    if (this.pos + count > this.end) throw new DecodeError("unexpected end of data", this.pos);
    this.pos += count;
  }

  name(): string {
    const length = this.u32();
    const start = this.pos;
    this.skip(length);
    return Buffer.from(this.bytes.subarray(start, start + length)).toString("utf8");
  }
}

// ============================================================================
// Module structure
// ============================================================================

interface FuncType {
  params: string[];
  results: string[];
}

interface FunctionImport {
  module: string;
  name: string;
}

interface CodeBody {
  start: number;
  end: number;
}

interface ModuleLayout {
  types: FuncType[];
  imports: FunctionImport[];
  functionTypes: number[];
  exports: Map<number, string>;
  names: Map<number, string>;
  bodies: CodeBody[];
}

function readLimits(reader: ByteReader): void {
  const flags = reader.u8();
  reader.u32();
  if ((flags & 1) !== 0) reader.u32();
}

function readSections(bytes: Uint8Array): ModuleLayout {
  const layout: ModuleLayout = {
    types: [],
    imports: [],
    functionTypes: [],
    exports: new Map(),
    names: new Map(),
    bodies: [],
  };
  const reader = new ByteReader(bytes, 8, bytes.length);

  while (!reader.done) {
    const id = reader.u8();
    const size = reader.u32();
    const start = reader.pos;
    const end = start + size;
    if (end > bytes.length) throw new DecodeError(`section ${id} exceeds module size`, start);
    const section = new ByteReader(bytes, start, end);

    switch (id) {
      case SECTION.type:
        for (let n = section.u32(); n > 0; n--) {
          if (section.u8() !== 0x60) throw new DecodeError("malformed function type", section.pos);
          const params = Array.from({ length: section.u32() }, () => valtype(section.u8()));
          const results = Array.from({ length: section.u32() }, () => valtype(section.u8()));
          layout.types.push({ params, results });
        }
        break;
      case SECTION.import:
        for (let n = section.u32(); n > 0; n--) {
          const module = section.name();
          const name = section.name();
          const kind = section.u8();
          if (kind === 0) {
            section.u32();
            layout.imports.push({ module, name });
          } else if (kind === 1) {
            section.u8();
            readLimits(section);
          } else if (kind === 2) {
            readLimits(section);
          } else if (kind === 3) {
            section.u8();
            section.u8();
          } else {
            section.u8();
            section.u32();
          }
        }
        break;
      case SECTION.function:
        for (let n = section.u32(); n > 0; n--) layout.functionTypes.push(section.u32());
        break;
      case SECTION.export:
        for (let n = section.u32(); n > 0; n--) {
          const name = section.name();
          const kind = section.u8();
          const index = section.u32();
          if (kind === 0 && !layout.exports.has(index)) layout.exports.set(index, name);
        }
        break;
      case SECTION.code:
        for (let n = section.u32(); n > 0; n--) {
          const bodySize = section.u32();
          layout.bodies.push({ start: section.pos, end: section.pos + bodySize });
          section.skip(bodySize);
        }
        break;
      case SECTION.custom:
        if (section.name() === "name") readNames(section, layout.names);
        break;
      default:
        break;
    }
    reader.pos = end;
  }
  return layout;
}

/** Function names from the `name` custom section; malformed entries are ignored. */
function readNames(section: ByteReader, names: Map<number, string>): void {
  try {
    while (!section.done) {
      const id = section.u8();
      const size = section.u32();
      const end = section.pos + size;
      if (id === 1) {
        for (let n = section.u32(); n > 0; n--) {
          const index = section.u32();
          names.set(index, section.name());
        }
      }
      section.pos = end;
    }
  } catch (error) {
    if (!(error instanceof DecodeError)) throw error;
  }
}

function valtype(byte: number): string {
  return VALTYPES[byte] ?? `0x${byte.toString(16)}`;
}

// ============================================================================
// Function bodies
// ============================================================================

interface ControlFrame {
  parent: Operation[];
  /** Else arm of an `if` frame */
  elseArm?: Operation[];
}

class BodyDecoder {
  private nextId = 1;
  private callCount = 0;
  private readonly operations: Operation[] = [];

  constructor(
    private readonly reader: ByteReader,
    private readonly functionName: string,
    private readonly file: string,
    private readonly imports: readonly FunctionImport[]
  ) {}

  decode(): Operation[] {
    for (let locals = this.reader.u32(); locals > 0; locals--) {
      this.reader.u32();
      this.reader.u8();
    }

    const frames: ControlFrame[] = [];
    let current = this.operations;

    while (!this.reader.done) {
      const offset = this.reader.pos;
      const opcode = this.reader.u8();

      switch (opcode) {
        case 0x00:
          current.push({ kind: "terminate", id: this.id(), reason: "revert", location: this.loc(offset) });
          break;
        case 0x02:
          this.blockType();
          frames.push({ parent: current });
          break;
        case 0x03: {
          this.blockType();
          const loop: LoopOp = { kind: "loop", id: this.id(), bound: "unbounded", body: [], location: this.loc(offset) };
          current.push(loop);
          frames.push({ parent: current });
          current = loop.body;
          break;
        }
        case 0x04: {
          this.blockType();
          const thenArm: Operation[] = [];
          const elseArm: Operation[] = [];
          const branch: BranchOp = { kind: "branch", id: this.id(), condition: "i32 != 0", arms: [thenArm, elseArm], location: this.loc(offset) };
          current.push(branch);
          frames.push({ parent: current, elseArm });
          current = thenArm;
          break;
        }
        case 0x05: {
          const frame = frames[frames.length - 1];
          if (frame?.elseArm === undefined) throw new DecodeError("'else' outside of 'if'", offset);
          current = frame.elseArm;
          break;
        }
        case 0x0b: {
          const frame = frames.pop();
          if (frame === undefined) {
            if (!this.reader.done) throw new DecodeError("code after the final 'end'", offset);
            return this.operations;
          }
          current = frame.parent;
          break;
        }
        case 0x0f:
          current.push({ kind: "terminate", id: this.id(), reason: "return", location: this.loc(offset) });
          break;
        case 0x10: {
          const index = this.reader.u32();
          const imported = this.imports[index];
          if (imported !== undefined) this.hostCall(imported, offset, current);
          break;
        }
        case 0x40:
          this.reader.u8();
          current.push({ kind: "memory-alloc", id: this.id(), allocation: "memory", preallocated: false, location: this.loc(offset) });
          break;
        default: {
          const operator = ARITHMETIC_OPCODES[opcode];
          if (operator !== undefined) {
            current.push({
              kind: "arithmetic",
              id: this.id(),
              operator,
              checked: false,
              operands: [opcode >= 0x7c ? "i64" : "i32", opcode >= 0x7c ? "i64" : "i32"],
              usage: "value",
              location: this.loc(offset),
            });
          } else {
            this.immediates(opcode, offset);
          }
        }
      }
    }
    throw new DecodeError("function body ends without 'end'", this.reader.pos);
  }

  private id(): number {
    return this.nextId++;
  }

  private loc(offset: number): SourceLocation {
    return { file: this.file, line: 1, column: offset + 1, function: this.functionName };
  }

  private blockType(): void {
    const next = this.reader.peek();
    if (next === 0x40 || (next !== undefined && VALTYPES[next] !== undefined)) {
      this.reader.u8();
    } else {
      this.reader.skipSigned(5);
    }
  }

  private hostCall(imported: FunctionImport, offset: number, out: Operation[]): void {
    const location = this.loc(offset);
    const hook = imported.module === "vm_hooks" ? imported.name : undefined;
    const env = hook === undefined ? undefined : HOOK_ENV[hook];
    const method = hook === undefined ? undefined : HOOK_CALLS[hook];

    if (hook === "storage_load_bytes32") {
      out.push({ kind: "storage-read", id: this.id(), slot: UNKNOWN_SLOT, location });
    } else if (hook === "storage_store_bytes32" || hook === "storage_cache_bytes32") {
      out.push({ kind: "storage-write", id: this.id(), slot: UNKNOWN_SLOT, keyRefs: [], valueRefs: [], location });
    } else if (env !== undefined) {
      out.push({ kind: "env-read", id: this.id(), variable: env, inCondition: false, location });
    } else if (method !== undefined && hook !== undefined) {
      out.push({
        kind: "external-call",
        id: this.id(),
        callSite: `${this.functionName}#${++this.callCount}`,
        target: "<dynamic>",
        targetKind: "computed",
        method,
        selector: hook,
        arguments: "",
        valueTransfer: false,
        resultChecked: this.reader.peek() !== OP_DROP,
        validated: false,
        location,
      });
    } else if (hook === "emit_log") {
      out.push({ kind: "emit", id: this.id(), event: "log", location });
    } else {
      const name = hook ?? `${imported.module}.${imported.name}`;
      out.push({ kind: "host-call", id: this.id(), name, location });
    }
  }

  /** Skip the immediates of an instruction that maps to no operation. */
  private immediates(opcode: number, offset: number): void {
    const r = this.reader;
    if (opcode === 0x01 || (opcode >= 0x1a && opcode <= 0x1b) || (opcode >= 0x45 && opcode <= 0xc4) || opcode === 0xd1) {
      return;
    }
    if (opcode === 0x0c || opcode === 0x0d || opcode === 0x12 || (opcode >= 0x20 && opcode <= 0x26) || opcode === 0xd2) {
      r.u32();
      return;
    }
    if (opcode === 0x0e) {
      for (let n = r.u32(); n >= 0; n--) r.u32();
      return;
    }
    if (opcode === 0x11 || opcode === 0x13) {
      r.u32();
      r.u32();
      return;
    }
    if (opcode === 0x1c) {
      r.skip(r.u32());
      return;
    }
    if (opcode >= 0x28 && opcode <= 0x3e) {
      r.u32();
      r.u32();
      return;
    }
    if (opcode === 0x3f || opcode === 0xd0) {
      r.u8();
      return;
    }
    if (opcode === 0x41) return r.skipSigned(5);
    if (opcode === 0x42) return r.skipSigned(10);
    if (opcode === 0x43) return r.skip(4);
    if (opcode === 0x44) return r.skip(8);
    if (opcode === 0xfc) return this.miscImmediates(r.u32(), offset);
    if (opcode === 0xfd) throw new DecodeError("SIMD instructions are not supported", offset);
    throw new DecodeError(`unknown opcode 0x${opcode.toString(16)}`, offset);
  }

  private miscImmediates(sub: number, offset: number): void {
    const r = this.reader;
    if (sub <= 7) return;
    if (sub === 8) {
      r.u32();
      r.u8();
    } else if (sub === 10) {
      r.u8();
      r.u8();
    } else if (sub === 11) {
      r.u8();
    } else if (sub === 12 || sub === 14) {
      r.u32();
      r.u32();
    } else if (sub === 9 || sub === 13 || (sub >= 15 && sub <= 17)) {
      r.u32();
    } else {
      throw new DecodeError(`unknown instruction 0xfc ${sub}`, offset);
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

export function isWasm(bytes: Uint8Array): boolean {
  return WASM_MAGIC.every((byte, i) => bytes[i] === byte);
}

function contractNameFrom(file: string): string {
  const stem = basename(file, extname(file));
  return /^[A-Za-z_][\w-]*$/.test(stem) ? stem : "Contract";
}

/**
 * Decode a WASM module into its contract structure. A function whose body
 * cannot be decoded is skipped with a diagnostic.
 */
export function parseWasm(bytes: Uint8Array, file: string): Result<ParsedContract, ParseError> {
  if (!isWasm(bytes) || bytes.length < 8) {
    return err(fatalParseError("Not a WebAssembly module: missing magic bytes", [], { file, line: 1, column: 1 }));
  }
  if (bytes[4] !== 1 || bytes[5] !== 0 || bytes[6] !== 0 || bytes[7] !== 0) {
    return err(fatalParseError("Unsupported WebAssembly version", [], { file, line: 1, column: 5 }));
  }

  let layout: ModuleLayout;
  try {
    layout = readSections(bytes);
  } catch (error) {
    if (!(error instanceof DecodeError)) throw error;
    const location = { file, line: 1, column: error.offset + 1 };
    return err(fatalParseError(`Malformed module: ${error.message}`, [parseDiagnostic(error.message, location)], location));
  }

  if (layout.bodies.length === 0) {
    return err(fatalParseError("Module defines no functions", []));
  }

  const diagnostics: Diagnostic[] = [];
  const functions: ParsedFunction[] = [];
  const importCount = layout.imports.length;

  layout.bodies.forEach((body, position) => {
    const index = importCount + position;
    const exported = layout.exports.get(index);
    const name = exported ?? layout.names.get(index) ?? `func_${index}`;
    const type = layout.types[layout.functionTypes[position] ?? -1] ?? { params: [], results: [] };
    const location: SourceLocation = { file, line: 1, column: body.start + 1, function: name };

    try {
      const operations = new BodyDecoder(new ByteReader(bytes, body.start, body.end), name, file, layout.imports).decode();
      const parameters: Parameter[] = type.params.map((t, i) => ({ name: `arg${i}`, type: t }));
      functions.push({
        name,
        visibility: exported === undefined ? "internal" : "external",
        mutability: "nonpayable",
        parameters,
        returns: type.results.length > 0 ? type.results.join(", ") : undefined,
        modifiers: [],
        isConstructor: false,
        operations,
        location,
      });
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      diagnostics.push(
        parseDiagnostic(`Skipped malformed function '${name}': ${error.message}`, {
          file,
          line: 1,
          column: error.offset + 1,
          function: name,
        })
      );
    }
  });

  if (functions.length === 0) {
    return err(fatalParseError("No function could be decoded", diagnostics, diagnostics[0]?.location));
  }

  return ok({
    name: contractNameFrom(file),
    functions,
    storage: [],
    constants: [],
    diagnostics,
  });
}
