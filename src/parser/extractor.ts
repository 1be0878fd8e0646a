/**
 * Operation Extractor
 *
 * Turns the token range of a function body into the ordered operation tree of
 * the IR. Operations are emitted in evaluation order: arguments before the
 * call consuming them, right-hand sides before the assignment target.
 *
 * Both source dialects share the walker; dialect differences are confined to
 * statement keywords, storage access syntax and call shapes.
 */

import type {
  ArithmeticOperator,
  ArithmeticUsage,
  CallMethod,
  CallTargetKind,
  EnvironmentVariable,
  ExternalCallOp,
  GuardKind,
  LoopBound,
  Operation,
  OperationKind,
  Parameter,
  SourceLocation,
  StorageTypeClass,
} from "../types/index.js";
import {
  findAtDepthZero,
  findClosingLenient,
  findOpening,
  isCloser,
  isOpener,
  splitTopLevel,
  tokensText,
  type Token,
} from "./lexer.js";

// ============================================================================
// Types
// ============================================================================

export interface ExtractionScope {
  file: string;
  functionName: string;
  dialect: "stylus" | "solidity";
  storage: ReadonlyMap<string, StorageTypeClass>;
  parameters: readonly Parameter[];
  /** Interface and contract type names declared in the file (Solidity) */
  interfaceTypes: ReadonlySet<string>;
  /** Solidity >= 0.8 checks arithmetic unless inside `unchecked` */
  checkedArithmetic: boolean;
  /** Declared type of each state variable, when known */
  storageTypes?: ReadonlyMap<string, string>;
}

interface ScanFlags {
  usage?: ArithmeticUsage;
  inCondition?: boolean;
  binding?: string[];
  target?: string;
}

/** Where a local binding's value came from. */
type Origin = "sender" | "storage" | "parameter" | "constant" | "unknown";

type Range = readonly [number, number];

// ============================================================================
// Patterns
// ============================================================================

const EOF: Token = { kind: "punct", value: "<eof>", offset: -1, line: 0, column: 0 };

const ARITHMETIC = new Set<string>(["+", "-", "*", "/", "%", "**"]);

const ASSIGNMENT = new Set(["=", "+=", "-=", "*=", "/=", "%=", "**=", "|=", "&=", "^="]);

const NOT_OPERAND = new Set([
  "return", "in", "let", "mut", "if", "else", "match", "while", "for", "loop", "emit",
  "revert", "delete", "new", "memory", "storage", "calldata", "ref", "move",
]);

const STORAGE_WRITE_METHODS = new Set([
  "set", "insert", "push", "delete", "erase", "pop", "grow", "remove", "clear",
  "set_str", "set_bytes", "extend", "truncate", "swap_remove",
]);

const STORAGE_SETTER_METHODS = new Set(["setter", "get_mut"]);

const STORAGE_READ_METHODS = new Set([
  "get", "getter", "len", "is_empty", "contains", "load", "get_string", "get_bytes", "iter",
  "first", "last",
]);

const RESULT_CHECK_METHODS = new Set([
  "unwrap", "expect", "is_ok", "is_err", "map_err", "ok_or", "ok_or_else", "unwrap_or",
  "unwrap_or_default", "unwrap_or_else", "ok",
]);

const CLONE_METHODS: Record<string, "clone" | "vec" | "string"> = {
  clone: "clone",
  to_vec: "vec",
  to_owned: "clone",
  to_string: "string",
};

const ARITHMETIC_METHOD = /^(checked|saturating|wrapping|overflowing)_(add|sub|mul|div|rem|pow)$/;

const METHOD_OPERATOR: Record<string, ArithmeticOperator> = {
  add: "+",
  sub: "-",
  mul: "*",
  div: "/",
  rem: "%",
  mod: "%",
  pow: "**",
};

const ACCESS_HELPER =
  /^_?(only_?owner|only_?admin|only_?role|only_?authorized|only_?governance|only_?minter|only_?operator|check_?owner|check_?role|check_?admin|ensure_?owner|ensure_?admin|require_?owner|require_?admin|require_?role|assert_?owner|assert_?admin|checkOwner|checkRole|authorize)$/i;

const ACCESS_TEXT =
  /msg::sender|msg\.sender|msg_sender|_msgSender|tx\.origin|tx::origin|only_?owner|is_?owner|is_?admin|has_?role|hasRole|isOwner|isAdmin|checkOwner|checkRole|authorized/i;

/** Operations allowed in the reverting arm of an `if` that acts as a guard. */
const GUARD_ARM_KINDS: ReadonlySet<OperationKind> = new Set<OperationKind>([
  "env-read",
  "emit",
  "storage-read",
  "memory-alloc",
  "arithmetic",
]);

const REENTRANCY_TEXT = /\block|locked|entered|reentran/i;

const ALLOWLIST_TEXT = /allow|whitelist|trusted|approved|registry|is_valid|isValid|supported|known/i;

const ZERO_CHECK = /address\(0\)|Address::ZERO|\bZERO\b|0x0+\b/;

const BALANCE_TEXT =
  /balance|stake|supply|reward|deposit|allowance|share|debt|collateral|fund|amount|price|fee|total/i;

const SENDER_TEXT = /^(msg::sender\(\)|msg\.sender|self\.vm\(\)\.msg_sender\(\)|_msgSender\(\))$/;

const CONSTANT_TEXT = /^(0x[0-9a-fA-F]{40}|address!\(.*\)|[A-Z][A-Z0-9_]*|Address::ZERO|address\(0\))$/;

const INTERFACE_CTOR = /(?:^|::)(\w+)::new\((.+)\)$/;

// ============================================================================
// Extractor
// ============================================================================

class OperationExtractor {
  private nextId = 1;
  private callCount = 0;
  private inUnchecked = false;
  private readonly params: Set<string>;
  private readonly locals = new Map<string, Origin>();
  private readonly typeOf = new Map<string, string>();
  private readonly interfaceTargets = new Map<string, string>();
  private readonly pendingResults = new Map<string, ExternalCallOp>();
  private readonly validated = new Set<string>();

  constructor(
    private readonly t: readonly Token[],
    private readonly scope: ExtractionScope
  ) {
    this.params = new Set(scope.parameters.map((p) => p.name));
    for (const p of scope.parameters) {
      this.typeOf.set(p.name, p.type);
    }
  }

  run(): Operation[] {
    const out: Operation[] = [];
    this.block(0, this.t.length, out);
    return out;
  }

  // -------------------------------------------------------------------------
  // Token access
  // -------------------------------------------------------------------------

  private tk(i: number): Token {
    return this.t[i] ?? EOF;
  }

  private is(i: number, value: string): boolean {
    const token = this.tk(i);
    return token.kind !== "string" && token.value === value;
  }

  private text(lo: number, hi: number): string {
    return tokensText(this.t, lo, hi);
  }

  private loc(i: number): SourceLocation {
    const token = this.tk(Math.min(i, this.t.length - 1));
    return {
      file: this.scope.file,
      line: token.line,
      column: token.column,
      function: this.scope.functionName,
    };
  }

  private id(): number {
    return this.nextId++;
  }

  private get rust(): boolean {
    return this.scope.dialect === "stylus";
  }

  private isStorage(name: string): boolean {
    return this.scope.storage.has(name) && !this.locals.has(name) && !this.params.has(name);
  }

  private storageUsage(slot: string, fallback?: ArithmeticUsage): ArithmeticUsage | undefined {
    return this.scope.storage.get(slot) === "array" ? "index" : fallback;
  }

  // -------------------------------------------------------------------------
  // Statements
  // -------------------------------------------------------------------------

  private block(lo: number, hi: number, out: Operation[]): void {
    let i = lo;
    while (i < hi) {
      const next = this.statement(i, hi, out);
      i = next > i ? next : i + 1;
    }
  }

  private statementEnd(i: number, hi: number): number {
    const end = findAtDepthZero(this.t, i, hi, (tok) => tok.kind === "punct" && tok.value === ";");
    return end === -1 ? hi : end;
  }

  private statement(i: number, hi: number, out: Operation[]): number {
    const token = this.tk(i);

    if (this.is(i, ";") || token.kind === "doc") return i + 1;
    if (this.is(i, "#") && this.is(i + 1, "[")) return findClosingLenient(this.t, i + 1, hi) + 1;
    if (token.kind === "lifetime" && this.is(i + 1, ":")) return i + 2;
    if (this.is(i, "{")) {
      const close = findClosingLenient(this.t, i, hi);
      this.block(i + 1, close, out);
      return close + 1;
    }

    if (token.kind === "ident") {
      switch (token.value) {
        case "if":
          return this.rust ? this.rustIf(i, hi, out) : this.solidityIf(i, hi, out);
        case "for":
          return this.rust ? this.rustFor(i, hi, out) : this.solidityFor(i, hi, out);
        case "while":
          return this.rust ? this.rustWhile(i, hi, out) : this.solidityWhile(i, hi, out);
        case "return":
          return this.returnStatement(i, hi, out);
        default:
          break;
      }
      if (this.rust) {
        const handled = this.rustStatement(i, hi, out);
        if (handled !== -1) return handled;
      } else {
        const handled = this.solidityStatement(i, hi, out);
        if (handled !== -1) return handled;
      }
    }

    const end = this.statementEnd(i, hi);
    this.expressionStatement(i, end, out, end >= hi);
    return end + 1;
  }

  private rustStatement(i: number, hi: number, out: Operation[]): number {
    switch (this.tk(i).value) {
      case "let":
        return this.letStatement(i, hi, out);
      case "loop": {
        if (!this.is(i + 1, "{")) return -1;
        return this.loopBlock(i, i + 1, hi, out, { bound: "unbounded" });
      }
      case "match":
        return this.matchStatement(i, hi, out);
      case "unsafe": {
        if (!this.is(i + 1, "{")) return -1;
        out.push({ kind: "unsafe", id: this.id(), reason: "unsafe-block", location: this.loc(i) });
        const close = findClosingLenient(this.t, i + 1, hi);
        this.block(i + 2, close, out);
        return close + 1;
      }
      default:
        return -1;
    }
  }

  private solidityStatement(i: number, hi: number, out: Operation[]): number {
    switch (this.tk(i).value) {
      case "do":
        return this.solidityDoWhile(i, hi, out);
      case "unchecked": {
        if (!this.is(i + 1, "{")) return -1;
        const close = findClosingLenient(this.t, i + 1, hi);
        const previous = this.inUnchecked;
        this.inUnchecked = true;
        this.block(i + 2, close, out);
        this.inUnchecked = previous;
        return close + 1;
      }
      case "assembly": {
        const open = findAtDepthZero(this.t, i + 1, hi, (tok) => tok.value === "{");
        if (open === -1) return -1;
        out.push({ kind: "unsafe", id: this.id(), reason: "inline-assembly", location: this.loc(i) });
        return findClosingLenient(this.t, open, hi) + 1;
      }
      case "emit": {
        const end = this.statementEnd(i, hi);
        const open = findAtDepthZero(this.t, i + 1, end, (tok) => tok.value === "(");
        if (open !== -1) {
          this.scanExpr(open + 1, findClosingLenient(this.t, open, end), out, {});
        }
        out.push({ kind: "emit", id: this.id(), event: this.text(i + 1, open === -1 ? end : open), location: this.loc(i) });
        return end + 1;
      }
      case "revert":
      case "throw": {
        const end = this.statementEnd(i, hi);
        this.scanExpr(i + 1, end, out, {});
        out.push({ kind: "terminate", id: this.id(), reason: "revert", location: this.loc(i) });
        return end + 1;
      }
      case "delete": {
        const end = this.statementEnd(i, hi);
        const target = this.storageTarget(i + 1, end);
        if (target) {
          if (target.key) this.scanExpr(target.key[0], target.key[1], out, { usage: this.storageUsage(target.slot) });
          this.pushWrite(i, target.slot, target.key, undefined, out);
        }
        return end + 1;
      }
      case "try":
        return this.solidityTry(i, hi, out);
      default:
        return -1;
    }
  }

  private returnStatement(i: number, hi: number, out: Operation[]): number {
    const end = this.statementEnd(i, hi);
    const reverts = this.rust && this.is(i + 1, "Err");
    this.scanExpr(i + 1, end, out, {});
    out.push({ kind: "terminate", id: this.id(), reason: reverts ? "revert" : "return", location: this.loc(i) });
    return end + 1;
  }

  private letStatement(i: number, hi: number, out: Operation[]): number {
    const end = this.statementEnd(i, hi);
    const eq = findAtDepthZero(this.t, i + 1, end, (tok) => tok.kind === "punct" && tok.value === "=");
    const colon = findAtDepthZero(this.t, i + 1, eq === -1 ? end : eq, (tok) => tok.value === ":");
    const patternEnd = colon !== -1 ? colon : eq !== -1 ? eq : end;
    const names = this.bindingNames(i + 1, patternEnd);

    if (eq !== -1) {
      this.scanExpr(eq + 1, end, out, { binding: names });
      const origin = this.origin(eq + 1, end);
      const rhs = this.text(eq + 1, end);
      for (const name of names) {
        this.locals.set(name, origin);
        const ctor = INTERFACE_CTOR.exec(rhs);
        if (ctor?.[2] !== undefined) this.interfaceTargets.set(name, ctor[2]);
      }
    } else {
      for (const name of names) this.locals.set(name, "unknown");
    }
    if (colon !== -1) {
      const typeText = this.text(colon + 1, eq === -1 ? end : eq);
      for (const name of names) this.typeOf.set(name, typeText);
    }
    return end + 1;
  }

  private bindingNames(lo: number, hi: number): string[] {
    const names: string[] = [];
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind !== "ident" || NOT_OPERAND.has(token.value)) continue;
      if (/^[A-Z]/.test(token.value) || this.is(k + 1, "(") || this.is(k + 1, "::")) continue;
      names.push(token.value);
    }
    return names;
  }

  /** Solidity local declaration: `uint256 x = ...`, `(bool ok, ) = ...`. */
  private solidityDeclaration(lo: number, hi: number): string[] | undefined {
    if (this.is(lo, "(")) {
      const close = findClosingLenient(this.t, lo, hi);
      const names: string[] = [];
      for (const [a, b] of splitTopLevel(this.t, lo + 1, close)) {
        const last = this.tk(b - 1);
        if (b - a >= 2 && last.kind === "ident") {
          names.push(last.value);
          this.typeOf.set(last.value, this.text(a, b - 1));
        }
      }
      return names.length > 0 ? names : undefined;
    }
    if (hi - lo < 2) return undefined;
    const last = this.tk(hi - 1);
    const before = this.tk(hi - 2);
    if (last.kind !== "ident" || NOT_OPERAND.has(this.tk(lo).value)) return undefined;
    for (let k = lo; k < hi; k++) {
      if (this.is(k, ".")) return undefined;
    }
    const typed = (before.kind === "ident" && !NOT_OPERAND.has(before.value)) ||
      before.value === "]" || ["memory", "storage", "calldata"].includes(before.value);
    if (!typed) return undefined;
    this.typeOf.set(last.value, this.text(lo, hi - 1));
    return [last.value];
  }

  private expressionStatement(lo: number, hi: number, out: Operation[], isTail: boolean): void {
    if (lo >= hi) return;

    if (this.rust && this.is(lo, "Err") && this.is(lo + 1, "(")) {
      const close = findClosingLenient(this.t, lo + 1, hi);
      if (this.is(close + 1, "?") || (isTail && close + 1 >= hi)) {
        this.scanExpr(lo + 2, close, out, {});
        out.push({ kind: "terminate", id: this.id(), reason: "revert", location: this.loc(lo) });
        return;
      }
    }

    const assign = findAtDepthZero(this.t, lo, hi, (tok) => tok.kind === "punct" && ASSIGNMENT.has(tok.value));

    if (!this.rust) {
      const names = this.solidityDeclaration(lo, assign === -1 ? hi : assign);
      if (names) {
        if (assign !== -1) {
          this.scanExpr(assign + 1, hi, out, { binding: names });
          const origin = this.origin(assign + 1, hi);
          for (const name of names) this.locals.set(name, origin);
        } else {
          for (const name of names) this.locals.set(name, "unknown");
        }
        return;
      }
    }

    if (assign === -1) {
      this.scanExpr(lo, hi, out, {});
      return;
    }
    this.assignment(lo, assign, hi, out);
  }

  private assignment(lo: number, opIndex: number, hi: number, out: Operation[]): void {
    const operator = this.tk(opIndex).value;
    const target = this.storageTarget(lo, opIndex);
    const lhsText = this.text(lo, opIndex);

    if (target?.key) {
      this.scanExpr(target.key[0], target.key[1], out, { usage: this.storageUsage(target.slot) });
    } else if (!target) {
      this.scanExpr(lo, opIndex, out, {});
    }
    this.scanExpr(opIndex + 1, hi, out, { target: lhsText });

    const arithmetic = operator.slice(0, -1);
    if (operator !== "=" && target) {
      out.push({ kind: "storage-read", id: this.id(), slot: target.slot, key: this.keyText(target.key), location: this.loc(lo) });
    }
    if (operator !== "=" && ARITHMETIC.has(arithmetic)) {
      const operands = [lhsText, this.text(opIndex + 1, hi)];
      out.push({
        kind: "arithmetic",
        id: this.id(),
        operator: this.asOperator(arithmetic),
        checked: this.checkedByDefault(),
        operands,
        target: lhsText,
        usage: this.usage(undefined, operands, lhsText),
        location: this.loc(opIndex),
      });
    }

    if (target) {
      this.pushWrite(lo, target.slot, target.key, [opIndex + 1, hi], out);
    } else if (operator === "=" && opIndex - lo === 1 && this.tk(lo).kind === "ident") {
      this.locals.set(this.tk(lo).value, this.origin(opIndex + 1, hi));
    }
  }

  private storageTarget(lo: number, hi: number): { slot: string; key?: Range } | undefined {
    let start = lo;
    while (this.is(start, "*")) start++;
    if (this.rust) {
      const field = this.tk(start + 2);
      if (this.is(start, "self") && this.is(start + 1, ".") && this.isStorage(field.value)) {
        if (this.is(start + 3, "[")) {
          const close = findClosingLenient(this.t, start + 3, hi);
          return { slot: field.value, key: [start + 4, close] };
        }
        return { slot: field.value };
      }
      return undefined;
    }
    const name = this.tk(start);
    if (name.kind !== "ident" || !this.isStorage(name.value) || start >= hi) return undefined;
    if (this.is(start + 1, "[")) {
      const close = findClosingLenient(this.t, start + 1, hi);
      return { slot: name.value, key: [start + 2, close] };
    }
    return { slot: name.value };
  }

  private keyText(key: Range | undefined): string | undefined {
    return key ? this.text(key[0], key[1]) : undefined;
  }

  private pushWrite(at: number, slot: string, key: Range | undefined, value: Range | undefined, out: Operation[]): void {
    out.push({
      kind: "storage-write",
      id: this.id(),
      slot,
      key: this.keyText(key),
      keyRefs: key ? this.refs(key[0], key[1]) : [],
      valueRefs: value ? this.refs(value[0], value[1]) : [],
      location: this.loc(at),
    });
  }

  // -------------------------------------------------------------------------
  // Control flow statements
  // -------------------------------------------------------------------------

  private rustIf(i: number, hi: number, out: Operation[]): number {
    const open = findAtDepthZero(this.t, i + 1, hi, (tok) => tok.kind === "punct" && tok.value === "{");
    if (open === -1) {
      this.scanExpr(i + 1, hi, out, {});
      return hi;
    }
    this.scanExpr(i + 1, open, out, { inCondition: true });
    const id = this.id();
    const close = findClosingLenient(this.t, open, hi);
    const thenArm: Operation[] = [];
    this.block(open + 1, close, thenArm);

    const elseArm: Operation[] = [];
    let next = close + 1;
    if (this.is(next, "else")) {
      if (this.is(next + 1, "if")) {
        next = this.rustIf(next + 1, hi, elseArm);
      } else if (this.is(next + 1, "{")) {
        const elseClose = findClosingLenient(this.t, next + 1, hi);
        this.block(next + 2, elseClose, elseArm);
        next = elseClose + 1;
      }
    }
    this.pushBranch(id, i + 1, open, [thenArm, elseArm], out);
    return next;
  }

  private solidityIf(i: number, hi: number, out: Operation[]): number {
    if (!this.is(i + 1, "(")) return this.statementEnd(i, hi) + 1;
    const close = findClosingLenient(this.t, i + 1, hi);
    this.scanExpr(i + 2, close, out, { inCondition: true });
    const id = this.id();
    const thenArm: Operation[] = [];
    let next = this.statement(close + 1, hi, thenArm);
    const elseArm: Operation[] = [];
    if (this.is(next, "else")) {
      next = this.statement(next + 1, hi, elseArm);
    }
    this.pushBranch(id, i + 2, close, [thenArm, elseArm], out);
    return next;
  }

  /**
   * A branch whose only arm reverts is a guard: `if caller != owner { return Err(..) }`.
   * Building the error value may read or allocate; it may not change state.
   */
  private pushBranch(id: number, condLo: number, condHi: number, arms: Operation[][], out: Operation[]): void {
    const condition = this.text(condLo, condHi);
    const [thenArm = [], elseArm = []] = arms;
    const last = thenArm[thenArm.length - 1];
    const revertsOnly =
      arms.length === 2 &&
      elseArm.length === 0 &&
      last?.kind === "terminate" &&
      last.reason === "revert" &&
      thenArm.every((op) => (op.kind === "terminate" ? op.reason === "revert" : GUARD_ARM_KINDS.has(op.kind)));

    if (revertsOnly) {
      out.push({ kind: "guard", id, guard: this.guardKind(condition, condLo, condHi), condition, location: this.loc(condLo - 1) });
      this.noteValidation(condition, condLo, condHi);
      return;
    }
    out.push({ kind: "branch", id, condition, arms, location: this.loc(condLo - 1) });
  }

  private matchStatement(i: number, hi: number, out: Operation[]): number {
    const open = findAtDepthZero(this.t, i + 1, hi, (tok) => tok.kind === "punct" && tok.value === "{");
    if (open === -1) return this.statementEnd(i, hi) + 1;
    this.scanExpr(i + 1, open, out, { inCondition: true });
    const id = this.id();
    const close = findClosingLenient(this.t, open, hi);
    const arms: Operation[][] = [];

    let k = open + 1;
    while (k < close) {
      const arrow = findAtDepthZero(this.t, k, close, (tok) => tok.value === "=>");
      if (arrow === -1) break;
      const arm: Operation[] = [];
      if (this.is(arrow + 1, "{")) {
        const armClose = findClosingLenient(this.t, arrow + 1, close);
        this.block(arrow + 2, armClose, arm);
        k = this.is(armClose + 1, ",") ? armClose + 2 : armClose + 1;
      } else {
        const comma = findAtDepthZero(this.t, arrow + 1, close, (tok) => tok.value === ",");
        const armEnd = comma === -1 ? close : comma;
        this.block(arrow + 1, armEnd, arm);
        k = armEnd + 1;
      }
      arms.push(arm);
    }

    out.push({ kind: "branch", id, condition: this.text(i + 1, open), arms, location: this.loc(i) });
    return this.is(close + 1, ";") ? close + 2 : close + 1;
  }

  private loopBlock(
    at: number,
    open: number,
    hi: number,
    out: Operation[],
    bound: { bound: LoopBound; iterations?: number; source?: string },
    trailer?: Range
  ): number {
    const id = this.id();
    const close = findClosingLenient(this.t, open, hi);
    const body: Operation[] = [];
    this.block(open + 1, close, body);
    if (trailer) this.scanExpr(trailer[0], trailer[1], body, {});
    out.push({
      kind: "loop",
      id,
      bound: bound.bound,
      iterations: bound.iterations,
      boundSource: bound.source,
      body,
      location: this.loc(at),
    });
    return close + 1;
  }

  private rustFor(i: number, hi: number, out: Operation[]): number {
    const inIndex = findAtDepthZero(this.t, i + 1, hi, (tok) => tok.value === "in");
    const open = inIndex === -1 ? -1 : findAtDepthZero(this.t, inIndex + 1, hi, (tok) => tok.kind === "punct" && tok.value === "{");
    if (open === -1) return this.statementEnd(i, hi) + 1;
    this.scanExpr(inIndex + 1, open, out, {});
    const bound = this.loopBound(inIndex + 1, open);
    for (const name of this.bindingNames(i + 1, inIndex)) this.locals.set(name, "unknown");
    return this.loopBlock(i, open, hi, out, bound);
  }

  private rustWhile(i: number, hi: number, out: Operation[]): number {
    const open = findAtDepthZero(this.t, i + 1, hi, (tok) => tok.kind === "punct" && tok.value === "{");
    if (open === -1) return this.statementEnd(i, hi) + 1;
    this.scanExpr(i + 1, open, out, { inCondition: true });
    return this.loopBlock(i, open, hi, out, this.loopBound(i + 1, open));
  }

  /** Run a Solidity loop body that may be a block or a single statement. */
  private solidityBody(at: number, start: number, hi: number, out: Operation[], bound: { bound: LoopBound; iterations?: number; source?: string }, trailer?: Range): number {
    if (this.is(start, "{")) {
      return this.loopBlock(at, start, hi, out, bound, trailer);
    }
    const id = this.id();
    const body: Operation[] = [];
    const next = this.statement(start, hi, body);
    if (trailer) this.scanExpr(trailer[0], trailer[1], body, {});
    out.push({ kind: "loop", id, bound: bound.bound, iterations: bound.iterations, boundSource: bound.source, body, location: this.loc(at) });
    return next;
  }

  private solidityFor(i: number, hi: number, out: Operation[]): number {
    if (!this.is(i + 1, "(")) return this.statementEnd(i, hi) + 1;
    const close = findClosingLenient(this.t, i + 1, hi);
    const semicolons: number[] = [];
    let depth = 0;
    for (let k = i + 2; k < close; k++) {
      const token = this.tk(k);
      if (isOpener(token)) depth++;
      else if (isCloser(token)) depth--;
      else if (depth === 0 && this.is(k, ";")) semicolons.push(k);
    }
    const [first, second] = semicolons;
    const init: Range = [i + 2, first ?? close];
    const cond: Range = first !== undefined ? [first + 1, second ?? close] : [close, close];
    const post: Range = second !== undefined ? [second + 1, close] : [close, close];
    this.expressionStatement(init[0], init[1], out, false);
    this.scanExpr(cond[0], cond[1], out, { inCondition: true });
    return this.solidityBody(i, close + 1, hi, out, this.loopBound(cond[0], cond[1]), post);
  }

  private solidityWhile(i: number, hi: number, out: Operation[]): number {
    if (!this.is(i + 1, "(")) return this.statementEnd(i, hi) + 1;
    const close = findClosingLenient(this.t, i + 1, hi);
    this.scanExpr(i + 2, close, out, { inCondition: true });
    return this.solidityBody(i, close + 1, hi, out, this.loopBound(i + 2, close));
  }

  private solidityDoWhile(i: number, hi: number, out: Operation[]): number {
    if (!this.is(i + 1, "{")) return -1;
    const close = findClosingLenient(this.t, i + 1, hi);
    let bound: { bound: LoopBound; iterations?: number; source?: string } = { bound: "unbounded" };
    let trailer: Range | undefined;
    let end = close + 1;
    if (this.is(close + 1, "while") && this.is(close + 2, "(")) {
      const condClose = findClosingLenient(this.t, close + 2, hi);
      bound = this.loopBound(close + 3, condClose);
      trailer = [close + 3, condClose];
      end = this.statementEnd(condClose, hi) + 1;
    }
    this.loopBlock(i, i + 1, hi, out, bound, trailer);
    return end;
  }

  private solidityTry(i: number, hi: number, out: Operation[]): number {
    const open = findAtDepthZero(this.t, i + 1, hi, (tok) => tok.kind === "punct" && tok.value === "{");
    if (open === -1) return this.statementEnd(i, hi) + 1;
    const returnsAt = findAtDepthZero(this.t, i + 1, open, (tok) => tok.value === "returns");
    this.scanExpr(i + 1, returnsAt === -1 ? open : returnsAt, out, { inCondition: true });
    const id = this.id();
    const arms: Operation[][] = [];
    let blockOpen = open;
    let next = open;
    while (blockOpen !== -1) {
      const close = findClosingLenient(this.t, blockOpen, hi);
      const arm: Operation[] = [];
      this.block(blockOpen + 1, close, arm);
      arms.push(arm);
      next = close + 1;
      if (!this.is(next, "catch")) break;
      blockOpen = findAtDepthZero(this.t, next + 1, hi, (tok) => tok.kind === "punct" && tok.value === "{");
    }
    out.push({ kind: "branch", id, condition: this.text(i + 1, open), arms, location: this.loc(i) });
    return next;
  }

  private loopBound(lo: number, hi: number): { bound: LoopBound; iterations?: number; source?: string } {
    const text = this.text(lo, hi);
    const range = /^(\d+)\s*\.\.(=?)\s*(\d+)$/.exec(text);
    if (range) {
      const iterations = Number(range[3]) - Number(range[1]) + (range[2] === "=" ? 1 : 0);
      return { bound: "constant", iterations: Math.max(0, iterations) };
    }
    const comparison = /(<=?)\s*(\d+)$/.exec(text);
    if (comparison) {
      const limit = Number(comparison[2]);
      return { bound: "constant", iterations: comparison[1] === "<=" ? limit + 1 : limit };
    }
    const slot = this.storageIn(lo, hi);
    if (slot !== undefined) return { bound: "storage", source: slot };
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind !== "ident") continue;
      const origin = this.locals.get(token.value);
      if (origin === "storage") return { bound: "storage", source: token.value };
      if (this.params.has(token.value) || origin === "parameter") {
        return { bound: "parameter", source: token.value };
      }
    }
    return { bound: "unbounded" };
  }

  // -------------------------------------------------------------------------
  // Expressions
  // -------------------------------------------------------------------------

  private scanExpr(lo: number, hi: number, out: Operation[], flags: ScanFlags): void {
    let i = lo;
    while (i < hi) {
      const next = this.scanAt(i, lo, hi, out, flags);
      i = next > i ? next : i + 1;
    }
  }

  private scanAt(i: number, lo: number, hi: number, out: Operation[], flags: ScanFlags): number {
    const token = this.tk(i);

    if (token.kind === "ident") {
      return this.scanIdent(i, lo, hi, out, flags);
    }
    if (token.kind !== "punct") {
      return i + 1;
    }

    const value = token.value;
    if (value === "[") {
      const close = findClosingLenient(this.t, i, hi);
      this.scanExpr(i + 1, close, out, { ...flags, usage: "index" });
      return close + 1;
    }
    if (value === "." && this.tk(i + 1).kind === "ident") {
      const handled = this.memberCall(i, lo, hi, out, flags);
      return handled === -1 ? i + 2 : handled;
    }
    if (this.rust && value === "*" && (this.is(i + 1, "mut") || this.is(i + 1, "const"))) {
      out.push({ kind: "unsafe", id: this.id(), reason: "raw-pointer", location: this.loc(i) });
      return i + 2;
    }
    if (ARITHMETIC.has(value) && this.isOperandEnd(i - 1, lo)) {
      const left = this.text(this.primaryStart(i - 1, lo), i);
      const right = this.text(i + 1, this.primaryEnd(i + 1, hi));
      const operands = [left, right];
      out.push({
        kind: "arithmetic",
        id: this.id(),
        operator: this.asOperator(value),
        checked: this.checkedByDefault(),
        operands,
        target: flags.target,
        usage: this.usage(flags.usage, operands, flags.target),
        location: this.loc(i),
      });
      return i + 1;
    }
    if (value === "++" || value === "--") {
      return this.increment(i, lo, hi, out);
    }
    return i + 1;
  }

  private scanIdent(i: number, lo: number, hi: number, out: Operation[], flags: ScanFlags): number {
    const name = this.tk(i).value;
    const afterDot = this.is(i - 1, ".") && i - 1 >= lo;

    const env = this.envRead(i);
    if (env) {
      out.push({ kind: "env-read", id: this.id(), variable: env.variable, inCondition: flags.inCondition === true, location: this.loc(i) });
      return env.end;
    }

    if (this.rust && name === "self" && this.is(i + 1, ".") && this.isStorage(this.tk(i + 2).value)) {
      return this.storageChain(i, hi, out, flags);
    }
    if (!this.rust && !afterDot && this.isStorage(name)) {
      return this.storageAccess(i, hi, out, flags);
    }

    if (!afterDot && ["require", "assert", "ensure", "assert_eq", "assert_ne", "debug_assert"].includes(name)) {
      const handled = this.guardCall(i, hi, out);
      if (handled !== -1) return handled;
    }

    if (ACCESS_HELPER.test(name) && this.is(i + 1, "(")) {
      const close = findClosingLenient(this.t, i + 1, hi);
      this.scanExpr(i + 2, close, out, {});
      if (flags.inCondition !== true) {
        const start = this.is(i - 1, ".") || this.is(i - 1, "::") ? this.primaryStart(i - 1, lo) : i;
        out.push({ kind: "guard", id: this.id(), guard: "access-control", condition: this.text(start, close + 1), location: this.loc(i) });
      }
      return close + 1;
    }

    if (this.rust) {
      const handled = this.rustIdent(i, hi, out, flags);
      if (handled !== -1) return handled;
    } else {
      const handled = this.solidityIdent(i, hi, out);
      if (handled !== -1) return handled;
    }

    const pending = this.pendingResults.get(name);
    if (pending && !afterDot) {
      const checkedHere =
        flags.inCondition === true ||
        this.is(i + 1, "?") ||
        (this.is(i + 1, ".") && RESULT_CHECK_METHODS.has(this.tk(i + 2).value));
      if (checkedHere) {
        pending.resultChecked = true;
        this.pendingResults.delete(name);
      }
    }
    return i + 1;
  }

  private rustIdent(i: number, hi: number, out: Operation[], flags: ScanFlags): number {
    const name = this.tk(i).value;
    const next = this.tk(i + 1).value;
    const afterDot = this.is(i - 1, ".");

    if (next === "!" && ["panic", "unreachable", "revert"].includes(name)) {
      const open = i + 2;
      const close = isOpener(this.tk(open)) ? findClosingLenient(this.t, open, hi) : open;
      this.scanExpr(open + 1, close, out, {});
      out.push({ kind: "terminate", id: this.id(), reason: "revert", location: this.loc(i) });
      return close + 1;
    }

    if (next === "!" && (name === "vec" || name === "format")) {
      out.push({ kind: "memory-alloc", id: this.id(), allocation: name === "vec" ? "vec" : "string", preallocated: false, location: this.loc(i) });
      return i + 2;
    }

    if (next === "::") {
      const member = this.tk(i + 2).value;
      const alloc = this.rustAllocation(name, member);
      if (alloc) {
        out.push({ ...alloc, id: this.id(), location: this.loc(i) });
        return i + 3;
      }
      if (name === "msg" && member === "send" && this.is(i + 3, "(")) {
        return this.freeCall(i + 2, hi, out, flags, "transfer");
      }
    }

    if (name === "transmute" || name === "MaybeUninit" || name === "ManuallyDrop" || name === "from_raw_parts") {
      const reason = name === "transmute" ? "transmute" : name === "from_raw_parts" ? "raw-pointer" : name === "MaybeUninit" ? "uninitialized-memory" : "manual-memory";
      out.push({ kind: "unsafe", id: this.id(), reason, location: this.loc(i) });
      return i + 1;
    }

    if (!afterDot && this.is(i + 1, "(")) {
      switch (name) {
        case "transfer_eth":
          return this.freeCall(i, hi, out, flags, "transfer");
        case "call":
          return this.freeCall(i, hi, out, flags, "call");
        case "static_call":
          return this.freeCall(i, hi, out, flags, "static-call");
        case "delegate_call":
          return this.freeCall(i, hi, out, flags, "delegate-call");
        case "log":
        case "emit_event": {
          const close = findClosingLenient(this.t, i + 1, hi);
          this.scanExpr(i + 2, close, out, {});
          out.push({ kind: "emit", id: this.id(), event: this.eventName(i + 2, close), location: this.loc(i) });
          return close + 1;
        }
        default:
          break;
      }
    }

    if (afterDot && name === "log" && this.is(i + 1, "(")) {
      const close = findClosingLenient(this.t, i + 1, hi);
      this.scanExpr(i + 2, close, out, {});
      out.push({ kind: "emit", id: this.id(), event: this.eventName(i + 2, close), location: this.loc(i) });
      return close + 1;
    }

    if (name === "unsafe" && this.is(i + 1, "{")) {
      out.push({ kind: "unsafe", id: this.id(), reason: "unsafe-block", location: this.loc(i) });
      return i + 1;
    }

    return -1;
  }

  private rustAllocation(
    type: string,
    member: string
  ): { kind: "memory-alloc"; allocation: "vec" | "string" | "box"; preallocated: boolean } | { kind: "unsafe"; reason: "manual-memory" } | undefined {
    if (type === "Box" && (member === "into_raw" || member === "from_raw" || member === "leak")) {
      return { kind: "unsafe", reason: "manual-memory" };
    }
    const allocation = type === "Vec" ? "vec" : type === "String" ? "string" : type === "Box" ? "box" : undefined;
    if (allocation === undefined || !["new", "with_capacity", "from", "from_utf8"].includes(member)) {
      return undefined;
    }
    return { kind: "memory-alloc", allocation, preallocated: member === "with_capacity" };
  }

  private solidityIdent(i: number, hi: number, out: Operation[]): number {
    const name = this.tk(i).value;

    if (name === "new" && this.tk(i + 1).kind === "ident") {
      const typeName = this.tk(i + 1).value;
      const allocation = this.is(i + 2, "[") ? "array" : typeName === "bytes" ? "bytes" : typeName === "string" ? "string" : "memory";
      out.push({ kind: "memory-alloc", id: this.id(), allocation, preallocated: allocation !== "memory", location: this.loc(i) });
      return i + 2;
    }
    if ((name === "abi" || name === "bytes" || name === "string") && this.is(i + 1, ".")) {
      const member = this.tk(i + 2).value;
      if (member.startsWith("encode") || member === "concat") {
        out.push({ kind: "memory-alloc", id: this.id(), allocation: name === "string" ? "string" : "bytes", preallocated: true, location: this.loc(i) });
        return i + 3;
      }
    }
    if (name === "selfdestruct" && this.is(i + 1, "(")) {
      const close = findClosingLenient(this.t, i + 1, hi);
      this.scanExpr(i + 2, close, out, {});
      out.push({ kind: "unsafe", id: this.id(), reason: "selfdestruct", location: this.loc(i) });
      return close + 1;
    }
    if (name === "revert" && (this.is(i + 1, "(") || this.tk(i + 1).kind === "ident")) {
      const end = this.statementEnd(i, hi);
      this.scanExpr(i + 1, end, out, {});
      out.push({ kind: "terminate", id: this.id(), reason: "revert", location: this.loc(i) });
      return end;
    }
    return -1;
  }

  private eventName(lo: number, hi: number): string {
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind === "ident" && /^[A-Z]/.test(token.value)) return token.value;
    }
    return this.text(lo, hi);
  }

  private envRead(i: number): { variable: EnvironmentVariable; end: number } | undefined {
    const name = this.tk(i).value;
    if (this.rust) {
      if (name === "self" && this.is(i + 1, ".") && this.is(i + 2, "vm") && this.is(i + 3, "(") && this.is(i + 4, ")") && this.is(i + 5, ".")) {
        const hook = this.tk(i + 6).value;
        const variable = VM_ENV[hook];
        if (variable && this.is(i + 7, "(")) {
          return { variable, end: findClosingLenient(this.t, i + 7, this.t.length) + 1 };
        }
        return undefined;
      }
      if (this.is(i + 1, "::") && this.is(i + 3, "(") && !this.is(i - 1, "::")) {
        const variable = PATH_ENV[`${name}::${this.tk(i + 2).value}`];
        if (variable) return { variable, end: findClosingLenient(this.t, i + 3, this.t.length) + 1 };
      }
      return undefined;
    }
    if (name === "now" && !this.is(i - 1, ".")) {
      return { variable: "block-timestamp", end: i + 1 };
    }
    if (this.is(i + 1, ".") && !this.is(i - 1, ".")) {
      const variable = MEMBER_ENV[`${name}.${this.tk(i + 2).value}`];
      if (variable) return { variable, end: i + 3 };
    }
    if (name === "_msgSender" && this.is(i + 1, "(")) {
      return { variable: "msg-sender", end: i + 3 };
    }
    return undefined;
  }

  /** Rust `self.<field>...` access chain. */
  private storageChain(i: number, hi: number, out: Operation[], flags: ScanFlags): number {
    const slot = this.tk(i + 2).value;
    let j = i + 3;
    let key: Range | undefined;
    let viaSetter = false;

    while (j < hi) {
      if (this.is(j, ".") && this.tk(j + 1).kind === "ident" && this.is(j + 2, "(")) {
        const method = this.tk(j + 1).value;
        const close = findClosingLenient(this.t, j + 2, hi);
        const args = splitTopLevel(this.t, j + 3, close);
        const argUsage = this.storageUsage(slot, flags.usage);

        if (STORAGE_WRITE_METHODS.has(method)) {
          const [first, second] = args;
          const writeKey = method === "insert" ? first : key;
          const value = method === "insert" ? second : method === "set" || method === "push" ? first : undefined;
          this.scanExpr(j + 3, close, out, { usage: argUsage });
          this.pushWrite(j + 1, slot, writeKey, value, out);
          return close + 1;
        }
        if (STORAGE_SETTER_METHODS.has(method)) {
          this.scanExpr(j + 3, close, out, { usage: argUsage });
          key = key ?? args[0];
          viaSetter = true;
          j = close + 1;
          continue;
        }
        if (STORAGE_READ_METHODS.has(method)) {
          this.scanExpr(j + 3, close, out, { usage: argUsage });
          if ((method === "get" || method === "getter" || method === "contains") && key === undefined) {
            key = args[0];
          }
          j = close + 1;
          continue;
        }
        break;
      }
      if (this.is(j, ".") && this.tk(j + 1).kind === "ident" && !this.is(j + 2, "(")) {
        j += 2;
        continue;
      }
      if (this.is(j, "[")) {
        const close = findClosingLenient(this.t, j, hi);
        this.scanExpr(j + 1, close, out, { usage: "index" });
        key = key ?? [j + 1, close];
        j = close + 1;
        continue;
      }
      break;
    }

    if (viaSetter) {
      this.pushWrite(i, slot, key, undefined, out);
    } else {
      out.push({ kind: "storage-read", id: this.id(), slot, key: this.keyText(key), location: this.loc(i) });
    }
    return j;
  }

  /** Solidity state variable access: `balances[user]`, `items.length`, `items.push(x)`. */
  private storageAccess(i: number, hi: number, out: Operation[], flags: ScanFlags): number {
    const slot = this.tk(i).value;
    let j = i + 1;
    let key: Range | undefined;

    while (this.is(j, "[")) {
      const close = findClosingLenient(this.t, j, hi);
      this.scanExpr(j + 1, close, out, { usage: this.storageUsage(slot, flags.usage) });
      key = key ?? [j + 1, close];
      j = close + 1;
    }

    while (this.is(j, ".") && this.tk(j + 1).kind === "ident") {
      const member = this.tk(j + 1).value;
      if ((member === "push" || member === "pop") && this.is(j + 2, "(")) {
        const close = findClosingLenient(this.t, j + 2, hi);
        this.scanExpr(j + 3, close, out, {});
        this.pushWrite(i, slot, key, [j + 3, close], out);
        return close + 1;
      }
      if (this.is(j + 2, "(") || this.is(j + 2, "{")) break;
      j += 2;
      if (member === "length") break;
    }

    out.push({ kind: "storage-read", id: this.id(), slot, key: this.keyText(key), location: this.loc(i) });
    return j;
  }

  private guardCall(i: number, hi: number, out: Operation[]): number {
    let open = i + 1;
    if (this.is(open, "!")) open++;
    if (!this.is(open, "(")) return -1;
    const close = findClosingLenient(this.t, open, hi);
    const name = this.tk(i).value;
    const args = splitTopLevel(this.t, open + 1, close);
    const whole = name === "assert_eq" || name === "assert_ne";
    const cond: Range = whole ? [open + 1, close] : args[0] ?? [open + 1, close];

    this.scanExpr(cond[0], cond[1], out, { inCondition: true });
    for (const arg of args.slice(whole ? args.length : 1)) {
      this.scanExpr(arg[0], arg[1], out, {});
    }
    const condition = this.text(cond[0], cond[1]);
    out.push({ kind: "guard", id: this.id(), guard: this.guardKind(condition, cond[0], cond[1]), condition, location: this.loc(i) });
    this.noteValidation(condition, cond[0], cond[1]);
    return close + 1;
  }

  private guardKind(condition: string, lo: number, hi: number): GuardKind {
    if (ACCESS_TEXT.test(condition)) return "access-control";
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind === "ident" && this.locals.get(token.value) === "sender") return "access-control";
    }
    if (REENTRANCY_TEXT.test(condition)) return "reentrancy";
    return "validation";
  }

  private noteValidation(condition: string, lo: number, hi: number): void {
    const comparesToFixed = /==|!=/.test(condition) && !ZERO_CHECK.test(condition);
    if (!ALLOWLIST_TEXT.test(condition) && !comparesToFixed) return;
    for (const ref of this.refs(lo, hi)) this.validated.add(ref);
  }

  // -------------------------------------------------------------------------
  // Calls
  // -------------------------------------------------------------------------

  /** Free-function calls: `transfer_eth(to, v)`, `call(ctx, to, data)`. */
  private freeCall(i: number, hi: number, out: Operation[], flags: ScanFlags, method: CallMethod): number {
    const open = i + 1;
    const close = findClosingLenient(this.t, open, hi);
    const args = splitTopLevel(this.t, open + 1, close);
    this.scanExpr(open + 1, close, out, {});

    const targetArg = method === "transfer" ? args[0] : args.length >= 2 ? args[1] : args[0];
    const target = targetArg ? this.text(targetArg[0], targetArg[1]) : "";
    const contextText = args[0] ? this.text(args[0][0], args[0][1]) : "";
    const valueTransfer = method === "transfer" || /value\(|new_payable/.test(contextText);

    this.pushCall(i, out, flags, {
      target,
      method,
      selector: this.tk(i).value,
      arguments: this.text(open + 1, close),
      valueTransfer,
      checked: flags.inCondition === true || this.checkedAfter(close),
    });
    return close + 1;
  }

  /** `.name(...)` after a receiver expression. Returns -1 when not a call of interest. */
  private memberCall(i: number, lo: number, hi: number, out: Operation[], flags: ScanFlags): number {
    const name = this.tk(i + 1).value;
    let open = i + 2;
    let options = "";
    if (!this.rust && this.is(open, "{")) {
      const optionsClose = findClosingLenient(this.t, open, hi);
      options = this.text(open + 1, optionsClose);
      open = optionsClose + 1;
    }
    if (!this.is(open, "(")) return -1;

    const close = findClosingLenient(this.t, open, hi);
    const args = splitTopLevel(this.t, open + 1, close);
    const receiverStart = this.primaryStart(i - 1, lo);
    const receiver = this.text(receiverStart, i);
    const argsText = this.text(open + 1, close);

    // `self.only_owner()?`, `self.ownable.check_owner()`
    if (ACCESS_HELPER.test(name) && rootIdent(receiver) === "self") {
      this.scanExpr(open + 1, close, out, {});
      if (flags.inCondition !== true) {
        out.push({ kind: "guard", id: this.id(), guard: "access-control", condition: this.text(receiverStart, close + 1), location: this.loc(i + 1) });
      }
      return close + 1;
    }

    const arithmetic = this.rust ? ARITHMETIC_METHOD.exec(name) : null;
    if (arithmetic || (this.rust && name === "pow") || (!this.rust && SAFE_MATH.has(name) && args.length === 1 && !this.isInterfaceReceiver(receiver))) {
      this.scanExpr(open + 1, close, out, {});
      const verb = arithmetic?.[2] ?? name;
      const checked = arithmetic ? arithmetic[1] === "checked" || arithmetic[1] === "saturating" : !this.rust;
      const operands = [receiver, argsText];
      out.push({
        kind: "arithmetic",
        id: this.id(),
        operator: METHOD_OPERATOR[verb] ?? "+",
        checked,
        operands,
        target: flags.target,
        usage: this.usage(flags.usage, operands, flags.target),
        location: this.loc(i + 1),
      });
      return close + 1;
    }

    if (this.rust) {
      const cloneKind = CLONE_METHODS[name];
      if (cloneKind !== undefined && args.length === 0) {
        out.push({ kind: "memory-alloc", id: this.id(), allocation: cloneKind, preallocated: false, location: this.loc(i + 1) });
        return close + 1;
      }
      if (receiver.includes("RawCall") && (name === "call" || name === "call_raw")) {
        this.scanExpr(open + 1, close, out, {});
        const method: CallMethod = receiver.includes("new_delegate") ? "delegate-call" : receiver.includes("new_static") ? "static-call" : "call";
        const first = args[0];
        this.pushCall(i + 1, out, flags, {
          target: first ? this.text(first[0], first[1]) : "",
          method,
          selector: "raw",
          arguments: argsText,
          valueTransfer: /new_with_value|value\(/.test(receiver),
          checked: flags.inCondition === true || this.checkedAfter(close),
        });
        return close + 1;
      }
      const ctor = INTERFACE_CTOR.exec(receiver);
      const interfaceType = ctor?.[1] ?? "";
      const bound = this.interfaceTargets.get(receiver);
      const isInterface = (ctor !== null && (/^I[A-Z]/.test(interfaceType) || argsText.includes("Call"))) || bound !== undefined;
      if (isInterface) {
        this.scanExpr(open + 1, close, out, {});
        this.pushCall(i + 1, out, flags, {
          target: ctor?.[2] ?? bound ?? receiver,
          method: "interface",
          selector: name,
          arguments: argsText,
          valueTransfer: /value\(|new_payable/.test(argsText),
          checked: flags.inCondition === true || this.checkedAfter(close),
        });
        return close + 1;
      }
      return -1;
    }

    const lowLevel = SOLIDITY_LOW_LEVEL[name];
    if (lowLevel !== undefined && (lowLevel !== "transfer" || args.length === 1)) {
      this.scanExpr(open + 1, close, out, {});
      this.pushCall(i + 1, out, flags, {
        target: receiver,
        method: lowLevel,
        selector: name,
        arguments: argsText,
        valueTransfer: name === "send" || name === "transfer" || /value/.test(options),
        checked: name === "transfer" || flags.inCondition === true,
      });
      return close + 1;
    }

    const wrapped = /^(\w+)\((.+)\)$/.exec(receiver);
    const wrappedType = wrapped?.[1] ?? "";
    if ((wrapped && this.isInterfaceType(wrappedType)) || this.isInterfaceReceiver(receiver)) {
      this.scanExpr(open + 1, close, out, {});
      this.pushCall(i + 1, out, flags, {
        target: wrapped && this.isInterfaceType(wrappedType) ? wrapped[2] ?? receiver : receiver,
        method: "interface",
        selector: name,
        arguments: argsText,
        valueTransfer: /value/.test(options),
        checked: true,
      });
      return close + 1;
    }
    return -1;
  }

  private isInterfaceType(type: string): boolean {
    return this.scope.interfaceTypes.has(type) || /^I[A-Z]\w*$/.test(type);
  }

  private isInterfaceReceiver(receiver: string): boolean {
    const root = /^\w+$/.exec(receiver)?.[0];
    if (root === undefined) return false;
    const type = this.typeOf.get(root) ?? this.scope.storageTypes?.get(root);
    return type !== undefined && this.isInterfaceType(type.split(/\s+/)[0] ?? "");
  }

  private checkedAfter(close: number): boolean {
    return this.is(close + 1, "?") || (this.is(close + 1, ".") && RESULT_CHECK_METHODS.has(this.tk(close + 2).value));
  }

  private pushCall(
    at: number,
    out: Operation[],
    flags: ScanFlags,
    call: { target: string; method: CallMethod; selector: string; arguments: string; valueTransfer: boolean; checked: boolean }
  ): void {
    const target = normalizeTarget(call.target);
    const op: ExternalCallOp = {
      kind: "external-call",
      id: this.id(),
      callSite: `${this.scope.functionName}#${++this.callCount}`,
      target,
      targetKind: this.targetKind(target),
      method: call.method,
      selector: call.selector,
      arguments: call.arguments,
      valueTransfer: call.valueTransfer,
      resultChecked: call.checked,
      validated: this.validated.has(rootIdent(target)),
      location: this.loc(at),
    };
    out.push(op);
    const binding = flags.binding?.[0];
    if (!op.resultChecked && binding !== undefined) {
      this.pendingResults.set(binding, op);
    }
  }

  private targetKind(target: string): CallTargetKind {
    if (SENDER_TEXT.test(target)) return "msg-sender";
    const root = rootIdent(target);
    if (root === "self") {
      const field = /^self\.(\w+)/.exec(target)?.[1];
      return field !== undefined && this.scope.storage.has(field) ? "storage" : "computed";
    }
    const origin = this.locals.get(root);
    if (origin === "sender") return "msg-sender";
    if (this.params.has(root) || origin === "parameter") return "parameter";
    if (origin === "storage" || (!this.rust && this.isStorage(root))) return "storage";
    if (origin === "constant" || CONSTANT_TEXT.test(target)) return "constant";
    return "computed";
  }

  // -------------------------------------------------------------------------
  // Solidity increments
  // -------------------------------------------------------------------------

  private increment(i: number, lo: number, hi: number, out: Operation[]): number {
    const operator: ArithmeticOperator = this.tk(i).value === "++" ? "+" : "-";
    const postfix = this.isOperandEnd(i - 1, lo);
    const start = postfix ? this.primaryStart(i - 1, lo) : i + 1;
    const end = postfix ? i : this.primaryEnd(i + 1, hi);
    const operandText = this.text(start, end);
    const target = this.storageTarget(start, end);

    if (!postfix && target) {
      if (target.key) this.scanExpr(target.key[0], target.key[1], out, { usage: this.storageUsage(target.slot) });
      out.push({ kind: "storage-read", id: this.id(), slot: target.slot, key: this.keyText(target.key), location: this.loc(start) });
    }
    out.push({
      kind: "arithmetic",
      id: this.id(),
      operator,
      checked: this.checkedByDefault(),
      operands: [operandText, "1"],
      target: operandText,
      usage: this.usage(undefined, [operandText], operandText),
      location: this.loc(i),
    });
    if (target) {
      this.pushWrite(start, target.slot, target.key, undefined, out);
    }
    return postfix ? i + 1 : target ? end : i + 1;
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private checkedByDefault(): boolean {
    return !this.rust && this.scope.checkedArithmetic && !this.inUnchecked;
  }

  private asOperator(value: string): ArithmeticOperator {
    return METHOD_OPERATOR[OPERATOR_NAME[value] ?? "add"] ?? "+";
  }

  private usage(context: ArithmeticUsage | undefined, operands: readonly string[], target: string | undefined): ArithmeticUsage {
    if (context !== undefined) return context;
    const texts = target !== undefined ? [...operands, target] : operands;
    return texts.some((text) => BALANCE_TEXT.test(text)) ? "balance" : "value";
  }

  private isOperandEnd(j: number, lo: number): boolean {
    if (j < lo) return false;
    const token = this.tk(j);
    if (token.kind === "ident") return !NOT_OPERAND.has(token.value);
    if (token.kind === "number" || token.kind === "string") return true;
    return token.kind === "punct" && (token.value === ")" || token.value === "]" || token.value === "?");
  }

  /** Start of the postfix expression (receiver, operand) ending at `j`. */
  private primaryStart(j: number, lo: number): number {
    let k = j;
    while (k >= lo) {
      const token = this.tk(k);
      if (isCloser(token)) {
        const open = findOpening(this.t, k, lo);
        if (open < 0) break;
        k = open - 1;
        if (k >= lo && (this.tk(k).kind === "ident" || isCloser(this.tk(k)))) continue;
      } else if (token.kind === "ident" || token.kind === "number" || token.kind === "string") {
        k--;
      } else if (token.value === "?") {
        k--;
        continue;
      } else {
        break;
      }
      if (k >= lo && (this.is(k, ".") || this.is(k, "::"))) {
        k--;
        continue;
      }
      break;
    }
    return k + 1;
  }

  /** End (exclusive) of the operand starting at `j`. */
  private primaryEnd(j: number, hi: number): number {
    let k = j;
    while (k < hi && ["&", "*", "!", "-", "mut"].includes(this.tk(k).value)) k++;
    if (isOpener(this.tk(k))) {
      k = findClosingLenient(this.t, k, hi) + 1;
    } else if (k < hi) {
      k++;
    }
    while (k < hi) {
      if (this.is(k, "(") || this.is(k, "[")) {
        k = findClosingLenient(this.t, k, hi) + 1;
      } else if ((this.is(k, ".") || this.is(k, "::")) && this.tk(k + 1).kind === "ident") {
        k += 2;
      } else if (this.is(k, "?")) {
        k++;
      } else {
        break;
      }
    }
    return Math.min(k, hi);
  }

  private storageIn(lo: number, hi: number): string | undefined {
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind !== "ident") continue;
      if (this.rust && token.value === "self" && this.is(k + 1, ".") && this.isStorage(this.tk(k + 2).value)) {
        return this.tk(k + 2).value;
      }
      if (!this.rust && !this.is(k - 1, ".") && this.isStorage(token.value)) {
        return token.value;
      }
    }
    return undefined;
  }

  private origin(lo: number, hi: number): Origin {
    const text = this.text(lo, hi);
    if (SENDER_TEXT.test(text)) return "sender";
    if (this.storageIn(lo, hi) !== undefined) return "storage";
    let sawIdent = false;
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind !== "ident") continue;
      sawIdent = true;
      const local = this.locals.get(token.value);
      if (this.params.has(token.value) || local === "parameter") return "parameter";
      if (local === "storage") return "storage";
      if (local === "sender" && hi - lo === 1) return "sender";
    }
    return sawIdent ? "unknown" : "constant";
  }

  /**
   * Identifiers an expression depends on. Caller identity appears as
   * "msg.sender", whether spelled directly or through a local alias.
   */
  private refs(lo: number, hi: number): string[] {
    const found = new Set<string>();
    for (let k = lo; k < hi; k++) {
      const token = this.tk(k);
      if (token.kind !== "ident") continue;
      const env = this.envRead(k);
      if (env?.variable === "msg-sender") {
        found.add("msg.sender");
        k = env.end - 1;
        continue;
      }
      if (this.is(k - 1, ".") || this.is(k - 1, "::") || this.is(k + 1, "::") || this.is(k + 1, "(") || this.is(k + 1, "!")) continue;
      if (NOT_OPERAND.has(token.value) || token.value === "self") continue;
      if (this.locals.get(token.value) === "sender") found.add("msg.sender");
      found.add(token.value);
    }
    return [...found];
  }
}

// ============================================================================
// Lookup tables
// ============================================================================

const VM_ENV: Record<string, EnvironmentVariable> = {
  msg_sender: "msg-sender",
  msg_value: "msg-value",
  tx_origin: "tx-origin",
  block_timestamp: "block-timestamp",
  block_number: "block-number",
};

const PATH_ENV: Record<string, EnvironmentVariable> = {
  "msg::sender": "msg-sender",
  "msg::value": "msg-value",
  "tx::origin": "tx-origin",
  "block::timestamp": "block-timestamp",
  "block::number": "block-number",
};

const MEMBER_ENV: Record<string, EnvironmentVariable> = {
  "msg.sender": "msg-sender",
  "msg.value": "msg-value",
  "tx.origin": "tx-origin",
  "block.timestamp": "block-timestamp",
  "block.number": "block-number",
};

const SOLIDITY_LOW_LEVEL: Record<string, CallMethod> = {
  call: "call",
  delegatecall: "delegate-call",
  staticcall: "static-call",
  send: "transfer",
  transfer: "transfer",
};

const SAFE_MATH = new Set(["add", "sub", "mul", "div", "mod"]);

const OPERATOR_NAME: Record<string, string> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "rem",
  "**": "pow",
};

function normalizeTarget(target: string): string {
  let text = target.trim().replace(/^[&*\s]+/, "");
  if (text.startsWith("mut ")) text = text.slice(4);
  const wrapped = /^(?:payable|address)\((.+)\)$/.exec(text);
  return wrapped?.[1] ?? text;
}

function rootIdent(text: string): string {
  return /^[A-Za-z_$][\w$]*/.exec(text)?.[0] ?? "";
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Extract the operation tree of one function body. `tokens` must hold only
 * the body, without the enclosing braces.
 */
export function extractOperations(tokens: readonly Token[], scope: ExtractionScope): Operation[] {
  const body = tokens.filter((token) => token.kind !== "doc");
  return new OperationExtractor(body, scope).run();
}
