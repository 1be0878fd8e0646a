/**
 * Solidity Front End
 *
 * Structural parser for Solidity-style contract input. Slang checks the
 * syntax; its errors are attributed to the function they fall in, and that
 * function is skipped with a diagnostic while the rest of the contract is
 * still modeled.
 *
 * Features:
 * - Multi-version Solidity support through the Slang parser
 * - State variables, modifiers, functions, constructor, receive and fallback
 * - NatSpec documentation on functions
 */

import { Parser } from "@nomicfoundation/slang/parser";
import { NonterminalKind } from "@nomicfoundation/slang/cst";
import { logger } from "../utils/logger.js";
import {
  err,
  ok,
  type Diagnostic,
  type ModifierKind,
  type ModifierRef,
  type ParseError,
  type Parameter,
  type Result,
  type SourceLocation,
  type StateMutability,
  type StorageTypeClass,
  type Visibility,
} from "../types/index.js";
import { extractOperations } from "./extractor.js";
import {
  classifyStorageType,
  documentation,
  fatalParseError,
  parseDiagnostic,
  tokenLocation,
  type ConstantDeclaration,
  type ParsedContract,
  type ParsedFunction,
  type StorageDeclaration,
} from "./frontend.js";
import {
  findAtDepthZero,
  findClosing,
  findClosingLenient,
  splitTopLevel,
  tokenize,
  tokensText,
  type Token,
} from "./lexer.js";

const log = logger.child({ component: "solidity-parser" });

// ============================================================================
// Types
// ============================================================================

interface ContractDecl {
  kind: "contract" | "library" | "interface";
  name: string;
  nameToken: Token;
  open: number;
  close: number;
}

export interface SlangSyntaxError {
  /** String index into the source */
  offset: number;
  message: string;
}

interface FunctionSkeleton {
  name: string;
  nameToken: Token;
  visibility: Visibility;
  mutability: StateMutability;
  parameters: Parameter[];
  returns?: string;
  modifierNames: string[];
  documentation?: string;
  isConstructor: boolean;
  body: readonly [number, number];
  span: readonly [number, number];
}

type SkeletonResult = { ok: true; skeleton: FunctionSkeleton | undefined; end: number } | { ok: false; message: string };

// ============================================================================
// Constants
// ============================================================================

const FALLBACK_VERSION = "0.8.28";

const EOF: Token = { kind: "punct", value: "<eof>", offset: -1, line: 0, column: 0 };

const VISIBILITIES = new Set<string>(["public", "private", "internal", "external"]);

const MUTABILITIES = new Set<string>(["view", "pure", "payable", "constant"]);

const FUNCTION_KEYWORDS = new Set([
  ...VISIBILITIES, ...MUTABILITIES, "virtual", "override", "returns", "nonpayable",
]);

const SKIPPED_ITEMS = new Set(["event", "error", "struct", "enum", "using", "type", "pragma", "import"]);

const STATE_VARIABLE_KEYWORDS = new Set([
  ...VISIBILITIES, "constant", "immutable", "override", "transient",
]);

const ACCESS_MODIFIER = /^(only|auth|restricted|requires?(Owner|Admin|Role|Auth))|Only$|^isAuthorized$/i;

const REENTRANCY_MODIFIER = /nonReentrant|noReentran|reentrancyGuard|lock|mutex/i;

const SENDER_CHECK = /msg\.sender|_msgSender|_checkOwner|_checkRole|hasRole|owner\(\)/;

const LOCK_CHECK = /locked|_status|entered|reentran/i;

// ============================================================================
// Version and syntax checks
// ============================================================================

/**
 * Detect Solidity version from pragma statement.
 */
export function detectSolidityVersion(source: string): string | undefined {
  const pragmaMatch = source.match(/pragma\s+solidity\s+[\^>=<~]*\s*(\d+\.\d+(?:\.\d+)?)/);
  const version = pragmaMatch?.[1];
  if (version === undefined) return undefined;
  return version.split(".").length === 2 ? `${version}.0` : version;
}

/** Solidity 0.8 and later revert on overflow outside `unchecked`. */
export function checksArithmetic(version: string | undefined): boolean {
  if (version === undefined) return true;
  const [major = 0, minor = 0] = version.split(".").map(Number);
  return major > 0 || minor >= 8;
}

function createParser(version: string): Parser | undefined {
  try {
    return Parser.create(version);
  } catch {
    log.warn(`Slang doesn't support version ${version}, falling back to ${FALLBACK_VERSION}`);
    try {
      return Parser.create(FALLBACK_VERSION);
    } catch (fallbackError) {
      log.warn("Failed to create Slang parser, skipping syntax check", {
        error: fallbackError instanceof Error ? fallbackError.message : String(fallbackError),
      });
      return undefined;
    }
  }
}

/** Byte offsets from Slang become string indices. */
function utf8ToIndex(source: string, utf8: number): number {
  return Buffer.from(source, "utf8").subarray(0, utf8).toString("utf8").length;
}

export function syntaxErrors(source: string, version: string | undefined): SlangSyntaxError[] {
  const parser = createParser(version ?? FALLBACK_VERSION);
  if (parser === undefined) return [];

  const parseOutput = parser.parseNonterminal(NonterminalKind.SourceUnit, source);
  return parseOutput.errors().map((error) => ({
    offset: utf8ToIndex(source, error.textRange.start.utf8),
    message: error.message,
  }));
}

// ============================================================================
// Parser
// ============================================================================

class SolidityParser {
  private readonly tokens: Token[];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly storage: StorageDeclaration[] = [];
  private readonly constants: ConstantDeclaration[] = [];
  private readonly skeletons: FunctionSkeleton[] = [];
  private readonly modifierKinds = new Map<string, ModifierKind>();
  private readonly interfaceTypes = new Set<string>();
  private readonly errors: SlangSyntaxError[];
  private readonly malformedSpans: Array<readonly [number, number]> = [];
  private readonly version: string | undefined;
  private attempted = 0;

  constructor(
    private readonly source: string,
    private readonly file: string
  ) {
    const lexed = tokenize(source, "solidity");
    this.tokens = lexed.tokens;
    for (const d of lexed.diagnostics) {
      this.diagnostics.push(parseDiagnostic(d.message, { file, line: d.line, column: d.column }));
    }
    this.version = detectSolidityVersion(source);
    this.errors = syntaxErrors(source, this.version);
  }

  parse(): Result<ParsedContract, ParseError> {
    const declarations = this.contracts();
    for (const decl of declarations) {
      if (decl.kind !== "library") this.interfaceTypes.add(decl.name);
    }

    const target =
      [...declarations].reverse().find((d) => d.kind === "contract") ??
      [...declarations].reverse().find((d) => d.kind === "library");
    if (target === undefined) {
      return err(fatalParseError("No contract or library declaration found", this.diagnostics));
    }

    this.members(target.open + 1, target.close);
    this.attributeSyntaxErrors();

    if (this.attempted > 0 && this.skeletons.length === 0) {
      return err(fatalParseError("No function could be parsed", this.diagnostics, this.diagnostics[0]?.location));
    }

    const storageClasses = new Map<string, StorageTypeClass>(this.storage.map((s) => [s.name, s.typeClass]));
    const storageTypes = new Map<string, string>(this.storage.map((s) => [s.name, s.declaredType]));
    const checkedArithmetic = checksArithmetic(this.version);

    const functions = this.skeletons.map((skeleton): ParsedFunction => ({
      name: skeleton.name,
      visibility: skeleton.visibility,
      mutability: skeleton.mutability,
      parameters: skeleton.parameters,
      returns: skeleton.returns,
      modifiers: skeleton.modifierNames.map((name): ModifierRef => ({ name, kind: this.modifierKind(name) })),
      documentation: skeleton.documentation,
      isConstructor: skeleton.isConstructor,
      operations: extractOperations(this.tokens.slice(skeleton.body[0], skeleton.body[1]), {
        file: this.file,
        functionName: skeleton.name,
        dialect: "solidity",
        storage: storageClasses,
        storageTypes,
        parameters: skeleton.parameters,
        interfaceTypes: this.interfaceTypes,
        checkedArithmetic,
      }),
      location: tokenLocation(skeleton.nameToken, this.file, skeleton.name),
    }));

    return ok({
      name: target.name,
      functions,
      storage: this.storage,
      constants: this.constants,
      diagnostics: this.diagnostics,
    });
  }

  // -------------------------------------------------------------------------
  // Token access
  // -------------------------------------------------------------------------

  private tk(i: number): Token {
    return this.tokens[i] ?? EOF;
  }

  private is(i: number, value: string): boolean {
    const token = this.tk(i);
    return token.kind !== "string" && token.value === value;
  }

  // -------------------------------------------------------------------------
  // Contracts
  // -------------------------------------------------------------------------

  private contracts(): ContractDecl[] {
    const found: ContractDecl[] = [];
    let i = 0;
    while (i < this.tokens.length) {
      const value = this.tk(i).value;
      const kind = value === "contract" || value === "library" || value === "interface" ? value : undefined;
      const nameToken = this.tk(i + 1);
      if (kind === undefined || nameToken.kind !== "ident") {
        i++;
        continue;
      }
      const open = findAtDepthZero(this.tokens, i + 2, this.tokens.length, (t) => t.value === "{" || t.value === ";");
      if (open === -1 || this.is(open, ";")) {
        i++;
        continue;
      }
      const close = findClosingLenient(this.tokens, open);
      found.push({ kind, name: nameToken.value, nameToken, open, close });
      i = close + 1;
    }
    return found;
  }

  private members(lo: number, hi: number): void {
    let docs: string[] = [];
    let i = lo;

    while (i < hi) {
      const token = this.tk(i);
      if (token.kind === "doc") {
        docs.push(token.value);
        i++;
        continue;
      }

      const value = token.value;
      if (value === "function" || value === "constructor" || value === "receive" || value === "fallback") {
        i = this.function(i, hi, docs);
      } else if (value === "modifier") {
        i = this.modifier(i, hi);
      } else if (SKIPPED_ITEMS.has(value)) {
        i = this.skipItem(i, hi);
      } else if (token.kind === "ident") {
        i = this.stateVariable(i, hi);
      } else {
        i++;
      }
      docs = [];
    }
  }

  private skipItem(i: number, hi: number): number {
    const stop = findAtDepthZero(this.tokens, i + 1, hi, (t) => t.value === ";" || t.value === "{");
    if (stop === -1) return hi;
    return this.is(stop, "{") ? findClosingLenient(this.tokens, stop, hi) + 1 : stop + 1;
  }

  private nextMember(from: number, hi: number): number {
    for (let k = from; k < hi; k++) {
      if (["function", "constructor", "modifier", "receive", "fallback"].includes(this.tk(k).value) && this.tk(k).kind === "ident") {
        return k;
      }
    }
    return hi;
  }

  // -------------------------------------------------------------------------
  // State variables and modifiers
  // -------------------------------------------------------------------------

  private stateVariable(i: number, hi: number): number {
    const end = findAtDepthZero(this.tokens, i, hi, (t) => t.value === ";" || t.value === "{" || t.value === "}");
    if (end === -1 || !this.is(end, ";")) {
      return end === -1 ? hi : end + 1;
    }
    const eq = findAtDepthZero(this.tokens, i, end, (t) => t.kind === "punct" && t.value === "=");
    const declEnd = eq === -1 ? end : eq;
    const nameToken = this.tk(declEnd - 1);
    if (declEnd - i < 2 || nameToken.kind !== "ident") return end + 1;

    const keywords = new Set<string>();
    const typeTokens: Token[] = [];
    for (let k = i; k < declEnd - 1; k++) {
      const t = this.tk(k);
      if (t.kind === "ident" && STATE_VARIABLE_KEYWORDS.has(t.value)) keywords.add(t.value);
      else typeTokens.push(t);
    }

    if (keywords.has("constant") || keywords.has("immutable")) {
      this.constants.push({ name: nameToken.value, location: tokenLocation(nameToken, this.file) });
      return end + 1;
    }
    const declaredType = tokensText(typeTokens, 0, typeTokens.length);
    if (!this.storage.some((s) => s.name === nameToken.value)) {
      this.storage.push({
        name: nameToken.value,
        declaredType,
        typeClass: classifyStorageType(declaredType),
        location: tokenLocation(nameToken, this.file),
      });
    }
    return end + 1;
  }

  private modifier(i: number, hi: number): number {
    const nameToken = this.tk(i + 1);
    const open = findAtDepthZero(this.tokens, i + 1, hi, (t) => t.value === "{" || t.value === ";");
    if (open === -1) return hi;
    if (this.is(open, ";")) return open + 1;
    const close = findClosingLenient(this.tokens, open, hi);
    if (nameToken.kind === "ident") {
      const body = tokensText(this.tokens, open + 1, close);
      const kind: ModifierKind = SENDER_CHECK.test(body)
        ? "access-control"
        : LOCK_CHECK.test(body)
          ? "reentrancy-guard"
          : this.kindFromName(nameToken.value);
      this.modifierKinds.set(nameToken.value, kind);
    }
    return close + 1;
  }

  private kindFromName(name: string): ModifierKind {
    if (REENTRANCY_MODIFIER.test(name)) return "reentrancy-guard";
    if (ACCESS_MODIFIER.test(name)) return "access-control";
    return "other";
  }

  private modifierKind(name: string): ModifierKind {
    return this.modifierKinds.get(name) ?? this.kindFromName(name);
  }

  // -------------------------------------------------------------------------
  // Functions
  // -------------------------------------------------------------------------

  private function(i: number, hi: number, docs: readonly string[]): number {
    const result = this.skeleton(i, hi, docs);
    if (!result.ok) {
      this.attempted++;
      const name = this.functionName(i);
      this.diagnostics.push(
        parseDiagnostic(`Skipped malformed function '${name}': ${result.message}`, tokenLocation(this.tk(i), this.file, name))
      );
      const resume = this.nextMember(i + 1, hi);
      const resumeOffset = resume < this.tokens.length ? this.tk(resume).offset : this.source.length;
      this.malformedSpans.push([this.tk(i).offset, resumeOffset]);
      return resume;
    }
    if (result.skeleton !== undefined) {
      this.attempted++;
      this.skeletons.push(result.skeleton);
    }
    return result.end;
  }

  private functionName(i: number): string {
    const keyword = this.tk(i).value;
    const next = this.tk(i + 1);
    return keyword === "function" && next.kind === "ident" ? next.value : keyword;
  }

  private skeleton(i: number, hi: number, docs: readonly string[]): SkeletonResult {
    const keyword = this.tk(i).value;
    let nameToken = this.tk(i);
    let open = i + 1;
    if (keyword === "function") {
      nameToken = this.tk(i + 1);
      if (nameToken.kind !== "ident") return { ok: false, message: "expected a function name" };
      open = i + 2;
    }
    if (!this.is(open, "(")) {
      return keyword === "function" || keyword === "constructor"
        ? { ok: false, message: "expected '(' after the function name" }
        : { ok: true, skeleton: undefined, end: i + 1 };
    }
    const params = findClosing(this.tokens, open, hi);
    if (!params.ok) return { ok: false, message: params.message };

    let visibility: Visibility | undefined;
    let mutability: StateMutability = "nonpayable";
    let returns: string | undefined;
    const modifierNames: string[] = [];
    let k = params.close + 1;
    let bodyOpen = -1;

    while (k < hi) {
      const token = this.tk(k);
      if (this.is(k, ";")) {
        // Declaration without implementation.
        return { ok: true, skeleton: undefined, end: k + 1 };
      }
      if (this.is(k, "{")) {
        bodyOpen = k;
        break;
      }
      if (token.kind !== "ident") {
        return { ok: false, message: `unexpected '${token.value}' in function header` };
      }
      if (VISIBILITIES.has(token.value)) {
        visibility = token.value === "public" || token.value === "external" || token.value === "internal" ? token.value : "private";
        k++;
      } else if (MUTABILITIES.has(token.value)) {
        mutability = token.value === "constant" ? "view" : token.value === "view" || token.value === "pure" ? token.value : "payable";
        k++;
      } else if (token.value === "returns") {
        if (!this.is(k + 1, "(")) return { ok: false, message: "expected '(' after returns" };
        const close = findClosing(this.tokens, k + 1, hi);
        if (!close.ok) return { ok: false, message: close.message };
        returns = tokensText(this.tokens, k + 2, close.close);
        k = close.close + 1;
      } else if (["function", "modifier", "constructor", "event"].includes(token.value)) {
        return { ok: false, message: "expected a function body" };
      } else {
        if (!FUNCTION_KEYWORDS.has(token.value)) modifierNames.push(token.value);
        if (this.is(k + 1, "(")) {
          const close = findClosing(this.tokens, k + 1, hi);
          if (!close.ok) return { ok: false, message: close.message };
          k = close.close + 1;
        } else {
          k++;
        }
      }
    }
    if (bodyOpen === -1) return { ok: false, message: "unexpected end of input before the function body" };

    const body = findClosing(this.tokens, bodyOpen, hi);
    if (!body.ok) return { ok: false, message: body.message };

    const name = keyword === "function" ? nameToken.value : keyword;
    const closeToken = this.tk(body.close);
    return {
      ok: true,
      end: body.close + 1,
      skeleton: {
        name,
        nameToken,
        visibility: visibility ?? (keyword === "receive" || keyword === "fallback" ? "external" : "public"),
        mutability,
        parameters: this.parameters(open + 1, params.close),
        returns,
        modifierNames,
        documentation: documentation(docs),
        isConstructor: keyword === "constructor",
        body: [bodyOpen + 1, body.close],
        span: [this.tk(i).offset, closeToken.offset + 1],
      },
    };
  }

  private parameters(lo: number, hi: number): Parameter[] {
    const parameters: Parameter[] = [];
    for (const [a, b] of splitTopLevel(this.tokens, lo, hi)) {
      const last = this.tk(b - 1);
      if (b - a < 2 || last.kind !== "ident" || ["memory", "storage", "calldata", "payable"].includes(last.value)) continue;
      parameters.push({ name: last.value, type: tokensText(this.tokens, a, b - 1) });
    }
    return parameters;
  }

  // -------------------------------------------------------------------------
  // Syntax error attribution
  // -------------------------------------------------------------------------

  /**
   * Drop every function containing a syntax error, with one diagnostic per
   * function. Errors outside function bodies are reported as they are, unless
   * they follow a function the hand parser already skipped.
   */
  private attributeSyntaxErrors(): void {
    if (this.errors.length === 0) return;
    log.warn(`Slang found ${this.errors.length} parse errors`, { file: this.file });

    const rejected = new Set<FunctionSkeleton>();
    for (const error of this.errors) {
      if (this.malformedSpans.some(([start, end]) => error.offset >= start && error.offset < end)) continue;
      const owner = this.skeletons.find((s) => error.offset >= s.span[0] && error.offset < s.span[1]);
      const location = this.offsetLocation(error.offset, owner?.name);
      if (owner === undefined) {
        // Recovery after a skipped function resurfaces past it, often at the end of input.
        if (this.malformedSpans.some(([start]) => error.offset >= start)) continue;
        this.diagnostics.push(parseDiagnostic(error.message, location));
      } else if (!rejected.has(owner)) {
        rejected.add(owner);
        this.diagnostics.push(
          parseDiagnostic(`Skipped malformed function '${owner.name}': ${error.message}`, tokenLocation(owner.nameToken, this.file, owner.name))
        );
      }
    }
    const kept = this.skeletons.filter((s) => !rejected.has(s));
    this.skeletons.length = 0;
    this.skeletons.push(...kept);
  }

  private offsetLocation(offset: number, fn?: string): SourceLocation {
    const before = this.source.slice(0, offset).split("\n");
    const location: SourceLocation = {
      file: this.file,
      line: before.length,
      column: (before[before.length - 1]?.length ?? 0) + 1,
    };
    return fn === undefined ? location : { ...location, function: fn };
  }
}

/**
 * Parse Solidity source into the structure of its last concrete contract.
 */
export function parseSolidity(source: string, file: string): Result<ParsedContract, ParseError> {
  return new SolidityParser(source, file).parse();
}
