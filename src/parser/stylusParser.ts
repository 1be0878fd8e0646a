/**
 * Stylus Front End
 *
 * Structural parser for Stylus contracts written against the Stylus SDK:
 * `sol_storage!` blocks, `#[storage]` / `#[entrypoint]` structs, `impl`
 * blocks (`#[public]`, `#[external]`) and their `fn` items.
 *
 * Every function is validated on its own. A function with unbalanced
 * brackets or a bad signature is skipped with one PARSE_ERROR diagnostic and
 * scanning resumes at the next `fn` keyword.
 */

import {
  err,
  ok,
  type Diagnostic,
  type ParseError,
  type Parameter,
  type Result,
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

// ============================================================================
// Types
// ============================================================================

interface ItemPrefix {
  attributes: string[];
  docs: string[];
}

interface ImplContext {
  typeName: string;
  exported: boolean;
}

/** A function whose signature and body were validated but not yet extracted. */
interface FunctionSkeleton {
  name: string;
  nameToken: Token;
  impl: ImplContext | undefined;
  isPub: boolean;
  crateOnly: boolean;
  mutability: StateMutability;
  parameters: Parameter[];
  returns?: string;
  documentation?: string;
  isConstructor: boolean;
  body: readonly [number, number];
}

type SkeletonResult = { ok: true; skeleton: FunctionSkeleton | undefined; end: number } | { ok: false; message: string };

const EOF: Token = { kind: "punct", value: "<eof>", offset: -1, line: 0, column: 0 };

const RECEIVERS = new Set(["self", "&self", "&mut self", "mut self"]);

const FN_QUALIFIERS = new Set(["async", "unsafe", "const", "extern"]);

// ============================================================================
// Parser
// ============================================================================

class StylusParser {
  private readonly tokens: Token[];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly storage: StorageDeclaration[] = [];
  private readonly constants: ConstantDeclaration[] = [];
  private readonly skeletons: FunctionSkeleton[] = [];
  private readonly interfaceTypes = new Set<string>();
  private readonly implTypes: ImplContext[] = [];
  private entrypoint: string | undefined;
  private firstStorageStruct: string | undefined;
  private attempted = 0;
  private sawStructure = false;

  constructor(
    source: string,
    private readonly file: string
  ) {
    const lexed = tokenize(source, "stylus");
    this.tokens = lexed.tokens;
    for (const d of lexed.diagnostics) {
      this.diagnostics.push(parseDiagnostic(d.message, { file, line: d.line, column: d.column }));
    }
  }

  parse(): Result<ParsedContract, ParseError> {
    this.items(0, this.tokens.length, undefined);

    if (!this.sawStructure) {
      return err(fatalParseError("No contract structure found: expected a storage struct, impl block or fn item", this.diagnostics));
    }
    if (this.attempted > 0 && this.skeletons.length === 0) {
      return err(fatalParseError("No function could be parsed", this.diagnostics, this.diagnostics[0]?.location));
    }

    const storageClasses = new Map<string, StorageTypeClass>(this.storage.map((s) => [s.name, s.typeClass]));
    const storageTypes = new Map<string, string>(this.storage.map((s) => [s.name, s.declaredType]));
    const functions = this.skeletons.map((skeleton): ParsedFunction => {
      const operations = extractOperations(this.tokens.slice(skeleton.body[0], skeleton.body[1]), {
        file: this.file,
        functionName: skeleton.name,
        dialect: "stylus",
        storage: storageClasses,
        storageTypes,
        parameters: skeleton.parameters,
        interfaceTypes: this.interfaceTypes,
        checkedArithmetic: false,
      });
      return {
        name: skeleton.name,
        visibility: this.visibility(skeleton),
        mutability: skeleton.mutability,
        parameters: skeleton.parameters,
        returns: skeleton.returns,
        modifiers: [],
        documentation: skeleton.documentation,
        isConstructor: skeleton.isConstructor,
        operations,
        location: tokenLocation(skeleton.nameToken, this.file, skeleton.name),
      };
    });

    return ok({
      name: this.contractName(),
      functions,
      storage: this.storage,
      constants: this.constants,
      diagnostics: this.diagnostics,
    });
  }

  private contractName(): string {
    return (
      this.entrypoint ??
      this.implTypes.find((impl) => impl.exported)?.typeName ??
      this.firstStorageStruct ??
      this.implTypes[0]?.typeName ??
      "Contract"
    );
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

  private nextFn(from: number, hi: number): number {
    for (let k = from; k < hi; k++) {
      if (this.is(k, "fn") && this.tk(k + 1).kind === "ident") return k;
    }
    return hi;
  }

  // -------------------------------------------------------------------------
  // Items
  // -------------------------------------------------------------------------

  private items(lo: number, hi: number, impl: ImplContext | undefined): void {
    let prefix: ItemPrefix = { attributes: [], docs: [] };
    let i = lo;

    while (i < hi) {
      const token = this.tk(i);

      if (token.kind === "doc") {
        prefix.docs.push(token.value);
        i++;
        continue;
      }
      if (this.is(i, "#") && this.is(i + 1, "!") && this.is(i + 2, "[")) {
        i = findClosingLenient(this.tokens, i + 2, hi) + 1;
        continue;
      }
      if (this.is(i, "#") && this.is(i + 1, "[")) {
        const close = findClosingLenient(this.tokens, i + 1, hi);
        prefix.attributes.push(tokensText(this.tokens, i + 2, close));
        i = close + 1;
        continue;
      }

      const next = this.item(i, hi, prefix, impl);
      if (next !== undefined) {
        prefix = { attributes: [], docs: [] };
        i = next;
        continue;
      }
      if (this.is(i, ";") || this.is(i, "}")) {
        prefix = { attributes: [], docs: [] };
      }
      i++;
    }
  }

  /** Handle one item starting at `i`; undefined when `i` starts no item of interest. */
  private item(i: number, hi: number, prefix: ItemPrefix, impl: ImplContext | undefined): number | undefined {
    const value = this.tk(i).value;
    if (this.tk(i).kind !== "ident") return undefined;

    if (this.is(i + 1, "!") && ["sol", "macro_rules", "sol_interface", "sol_storage"].includes(value)) {
      const open = findAtDepthZero(this.tokens, i + 2, hi, (t) => t.value === "{" || t.value === "(");
      if (open === -1) return i + 2;
      const close = findClosingLenient(this.tokens, open, hi);
      if (value === "sol_storage") this.solStorage(open + 1, close);
      if (value === "sol_interface") this.solInterfaces(open + 1, close);
      return close + 1;
    }

    switch (value) {
      case "mod": {
        const open = findAtDepthZero(this.tokens, i + 1, hi, (t) => t.value === "{" || t.value === ";");
        if (open === -1 || this.is(open, ";")) return open === -1 ? hi : open + 1;
        const close = findClosingLenient(this.tokens, open, hi);
        const isTest = this.is(i + 1, "tests") || prefix.attributes.some((a) => /cfg\s*\(\s*test\s*\)/.test(a));
        if (!isTest) this.items(open + 1, close, undefined);
        return close + 1;
      }
      case "struct":
        return this.struct(i, hi, prefix);
      case "impl":
        return this.impl(i, hi, prefix);
      case "trait": {
        const open = findAtDepthZero(this.tokens, i + 1, hi, (t) => t.value === "{");
        return open === -1 ? hi : findClosingLenient(this.tokens, open, hi) + 1;
      }
      case "fn":
        return this.fn(i, hi, prefix, impl);
      case "const":
      case "static": {
        const nameToken = this.tk(i + 1);
        if (nameToken.kind !== "ident" || !this.is(i + 2, ":")) return undefined;
        this.constants.push({ name: nameToken.value, location: tokenLocation(nameToken, this.file) });
        const end = findAtDepthZero(this.tokens, i + 2, hi, (t) => t.value === ";");
        return end === -1 ? hi : end + 1;
      }
      default:
        return undefined;
    }
  }

  // -------------------------------------------------------------------------
  // Storage
  // -------------------------------------------------------------------------

  /** `sol_storage! { #[entrypoint] pub struct Vault { mapping(address => uint256) balances; } }` */
  private solStorage(lo: number, hi: number): void {
    let entry = false;
    let i = lo;
    while (i < hi) {
      if (this.is(i, "#") && this.is(i + 1, "[")) {
        const close = findClosingLenient(this.tokens, i + 1, hi);
        entry = entry || tokensText(this.tokens, i + 2, close) === "entrypoint";
        i = close + 1;
        continue;
      }
      if (this.is(i, "struct") && this.tk(i + 1).kind === "ident" && this.is(i + 2, "{")) {
        const name = this.tk(i + 1).value;
        const close = findClosingLenient(this.tokens, i + 2, hi);
        this.noteStruct(name, entry);
        for (const [a, b] of splitTopLevel(this.tokens, i + 3, close, ";")) {
          if (b - a < 2) continue;
          const field = this.tk(b - 1);
          if (field.kind !== "ident") continue;
          const declaredType = tokensText(this.tokens, a, b - 1);
          this.declare(field, declaredType);
        }
        entry = false;
        i = close + 1;
        continue;
      }
      i++;
    }
  }

  private solInterfaces(lo: number, hi: number): void {
    for (let k = lo; k < hi; k++) {
      if (this.is(k, "interface") && this.tk(k + 1).kind === "ident") {
        this.interfaceTypes.add(this.tk(k + 1).value);
      }
    }
  }

  private struct(i: number, hi: number, prefix: ItemPrefix): number {
    const nameToken = this.tk(i + 1);
    const open = findAtDepthZero(this.tokens, i + 1, hi, (t) => t.value === "{" || t.value === ";" || t.value === "(");
    if (open === -1) return hi;
    if (!this.is(open, "{")) {
      const semicolon = findAtDepthZero(this.tokens, open, hi, (t) => t.value === ";");
      return semicolon === -1 ? hi : semicolon + 1;
    }
    const close = findClosingLenient(this.tokens, open, hi);

    const fields: Array<{ token: Token; type: string }> = [];
    for (const [a, b] of splitTopLevel(this.tokens, open + 1, close, ",", true)) {
      const colon = findAtDepthZero(this.tokens, a, b, (t) => t.value === ":");
      if (colon === -1) continue;
      const field = this.tk(colon - 1);
      if (field.kind !== "ident") continue;
      fields.push({ token: field, type: tokensText(this.tokens, colon + 1, b) });
    }

    const entry = prefix.attributes.includes("entrypoint");
    const isStorage = entry || prefix.attributes.includes("storage") || fields.some((f) => f.type.startsWith("Storage"));
    if (isStorage && nameToken.kind === "ident") {
      this.noteStruct(nameToken.value, entry);
      for (const f of fields) this.declare(f.token, f.type);
    }
    return close + 1;
  }

  private noteStruct(name: string, entry: boolean): void {
    this.sawStructure = true;
    if (entry && this.entrypoint === undefined) this.entrypoint = name;
    this.firstStorageStruct = this.firstStorageStruct ?? name;
  }

  private declare(field: Token, declaredType: string): void {
    if (this.storage.some((s) => s.name === field.value)) return;
    this.storage.push({
      name: field.value,
      declaredType,
      typeClass: classifyStorageType(declaredType),
      location: tokenLocation(field, this.file),
    });
  }

  // -------------------------------------------------------------------------
  // Impl blocks and functions
  // -------------------------------------------------------------------------

  private impl(i: number, hi: number, prefix: ItemPrefix): number {
    const open = findAtDepthZero(this.tokens, i + 1, hi, (t) => t.value === "{");
    if (open === -1) return hi;
    this.sawStructure = true;

    const forIndex = findAtDepthZero(this.tokens, i + 1, open, (t) => t.value === "for");
    let k = forIndex === -1 ? i + 1 : forIndex + 1;
    if (this.is(k, "<")) {
      while (k < open && !this.is(k, ">")) k++;
      k++;
    }
    const typeName = this.tk(k).kind === "ident" ? this.tk(k).value : "Contract";
    const context: ImplContext = {
      typeName,
      exported: prefix.attributes.some((a) => a === "public" || a === "external" || a.startsWith("public(")),
    };
    this.implTypes.push(context);

    // A broken function may leave the block unbalanced; it then runs to the end.
    const close = findClosingLenient(this.tokens, open, hi);
    this.items(open + 1, close, context);
    return close + 1;
  }

  private fn(i: number, hi: number, prefix: ItemPrefix, impl: ImplContext | undefined): number {
    this.sawStructure = true;
    const result = this.skeleton(i, hi, prefix, impl);
    if (!result.ok) {
      this.attempted++;
      const name = this.tk(i + 1).kind === "ident" ? this.tk(i + 1).value : undefined;
      this.diagnostics.push(
        parseDiagnostic(
          `Skipped malformed function${name === undefined ? "" : ` '${name}'`}: ${result.message}`,
          tokenLocation(this.tk(i), this.file, name)
        )
      );
      return this.nextFn(i + 1, hi);
    }
    if (result.skeleton !== undefined) {
      this.attempted++;
      this.skeletons.push(result.skeleton);
    }
    return result.end;
  }

  private skeleton(i: number, hi: number, prefix: ItemPrefix, impl: ImplContext | undefined): SkeletonResult {
    const nameToken = this.tk(i + 1);
    if (nameToken.kind !== "ident") {
      return { ok: false, message: "expected a function name" };
    }

    let open = i + 2;
    if (this.is(open, "<")) {
      let depth = 0;
      for (; open < hi; open++) {
        if (this.is(open, "<")) depth++;
        else if (this.is(open, ">")) depth--;
        if (depth === 0) break;
      }
      open++;
    }
    if (!this.is(open, "(")) {
      return { ok: false, message: "expected '(' after the function name" };
    }
    const params = findClosing(this.tokens, open, hi);
    if (!params.ok) {
      return { ok: false, message: params.message };
    }

    let bodyOpen = -1;
    for (let k = params.close + 1; k < hi; k++) {
      if (this.is(k, "{")) {
        bodyOpen = k;
        break;
      }
      if (this.is(k, ";")) {
        // Declaration without a body, as in a trait.
        return { ok: true, skeleton: undefined, end: k + 1 };
      }
      if (this.is(k, "fn") || this.is(k, "}")) {
        return { ok: false, message: "expected a function body" };
      }
    }
    if (bodyOpen === -1) {
      return { ok: false, message: "unexpected end of input before the function body" };
    }
    const body = findClosing(this.tokens, bodyOpen, hi);
    if (!body.ok) {
      return { ok: false, message: body.message };
    }

    const { parameters, receiver } = this.parameters(open + 1, params.close);
    const arrow = findAtDepthZero(this.tokens, params.close + 1, bodyOpen, (t) => t.value === "->");
    const whereAt = findAtDepthZero(this.tokens, params.close + 1, bodyOpen, (t) => t.value === "where");
    const returns = arrow === -1 ? undefined : tokensText(this.tokens, arrow + 1, whereAt === -1 ? bodyOpen : whereAt);

    let q = i - 1;
    while (FN_QUALIFIERS.has(this.tk(q).value) || this.tk(q).kind === "string") q--;
    const crateOnly = this.is(q, ")") && this.is(q - 1, "crate");
    const isPub = this.is(q, "pub") || (crateOnly && this.is(q - 3, "pub"));
    const name = nameToken.value;

    return {
      ok: true,
      end: body.close + 1,
      skeleton: {
        name,
        nameToken,
        impl,
        isPub,
        crateOnly,
        mutability: this.mutability(receiver, prefix.attributes),
        parameters,
        returns,
        documentation: documentation(prefix.docs),
        isConstructor: name === "constructor" || prefix.attributes.includes("constructor"),
        body: [bodyOpen + 1, body.close],
      },
    };
  }

  private parameters(lo: number, hi: number): { parameters: Parameter[]; receiver: string | undefined } {
    const parameters: Parameter[] = [];
    let receiver: string | undefined;
    for (const [a, b] of splitTopLevel(this.tokens, lo, hi, ",", true)) {
      const text = tokensText(this.tokens, a, b);
      const normalized = text.replace(/&'\w+ /, "&");
      if (RECEIVERS.has(normalized)) {
        receiver = normalized;
        continue;
      }
      const colon = findAtDepthZero(this.tokens, a, b, (t) => t.value === ":");
      if (colon === -1) continue;
      const nameToken = this.tk(colon - 1);
      if (nameToken.kind !== "ident") continue;
      parameters.push({ name: nameToken.value, type: tokensText(this.tokens, colon + 1, b) });
    }
    return { parameters, receiver };
  }

  /**
   * `pub fn` in an exported impl is an entry point. Without any `#[public]`
   * impl, every `pub fn` of an impl block is treated as one.
   */
  private visibility(skeleton: FunctionSkeleton): Visibility {
    const { impl } = skeleton;
    if (impl === undefined || skeleton.crateOnly) return "internal";
    if (!skeleton.isPub) return "private";
    const anyExported = this.implTypes.some((ctx) => ctx.exported);
    return impl.exported || !anyExported ? "public" : "internal";
  }

  private mutability(receiver: string | undefined, attributes: readonly string[]): StateMutability {
    if (attributes.includes("payable")) return "payable";
    if (receiver === undefined) return "pure";
    return receiver.includes("mut") ? "nonpayable" : "view";
  }
}

/**
 * Parse Stylus SDK source into its contract structure.
 */
export function parseStylus(source: string, file: string): Result<ParsedContract, ParseError> {
  return new StylusParser(source, file).parse();
}
