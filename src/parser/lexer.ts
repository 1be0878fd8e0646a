/**
 * Source Lexer
 *
 * Tokenizer shared by the Stylus (Rust) and Solidity front ends. It never
 * throws: unterminated strings or comments end the token stream and are
 * reported as diagnostics so the structural parser can recover.
 */

// ============================================================================
// Types
// ============================================================================

export type TokenKind = "ident" | "number" | "string" | "punct" | "doc" | "lifetime";

export interface Token {
  kind: TokenKind;
  value: string;
  offset: number;
  line: number;
  column: number;
}

export interface LexDiagnostic {
  message: string;
  line: number;
  column: number;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: LexDiagnostic[];
}

export type LexDialect = "stylus" | "solidity";

// ============================================================================
// Constants
// ============================================================================

const COMMON_PUNCT = [
  "..=",
  "::",
  "->",
  "=>",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "|=",
  "&=",
  "^=",
  "..",
];

const SOLIDITY_PUNCT = ["**=", "**", "++", "--"];

const PUNCT_BY_DIALECT: Record<LexDialect, string[]> = {
  stylus: COMMON_PUNCT,
  solidity: [...SOLIDITY_PUNCT, ...COMMON_PUNCT.filter((p) => p !== "..=" && p !== "..")],
};

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;

// ============================================================================
// Lexer
// ============================================================================

class Lexer {
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  private readonly tokens: Token[] = [];
  private readonly diagnostics: LexDiagnostic[] = [];
  private readonly punct: string[];

  constructor(
    private readonly source: string,
    private readonly dialect: LexDialect
  ) {
    this.punct = PUNCT_BY_DIALECT[dialect];
  }

  run(): LexResult {
    while (this.pos < this.source.length) {
      if (!this.step()) {
        break;
      }
    }
    return { tokens: this.tokens, diagnostics: this.diagnostics };
  }

  private char(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  private column(at: number): number {
    return at - this.lineStart + 1;
  }

  /** Advance to `end`, keeping line bookkeeping in sync. */
  private advanceTo(end: number): void {
    for (let i = this.pos; i < end; i++) {
      if (this.source.charAt(i) === "\n") {
        this.line++;
        this.lineStart = i + 1;
      }
    }
    this.pos = end;
  }

  private push(kind: TokenKind, value: string, start: number, line: number, column: number): void {
    this.tokens.push({ kind, value, offset: start, line, column });
  }

  private fail(message: string, line: number, column: number): false {
    this.diagnostics.push({ message, line, column });
    return false;
  }

  /** Lex one token or skip one run of trivia. Returns false when input is exhausted early. */
  private step(): boolean {
    const start = this.pos;
    const line = this.line;
    const column = this.column(start);
    const c = this.char();

    if (/\s/.test(c)) {
      this.advanceTo(start + 1);
      return true;
    }

    if (c === "/" && this.char(1) === "/") {
      const newline = this.source.indexOf("\n", start);
      const end = newline === -1 ? this.source.length : newline;
      const text = this.source.slice(start, end);
      const isDoc = (text.startsWith("///") && !text.startsWith("////")) || text.startsWith("//!");
      if (isDoc) {
        this.push("doc", text.slice(3).trim(), start, line, column);
      }
      this.advanceTo(end);
      return true;
    }

    if (c === "/" && this.char(1) === "*") {
      const close = this.source.indexOf("*/", start + 2);
      if (close === -1) {
        return this.fail("Unterminated block comment", line, column);
      }
      const text = this.source.slice(start, close + 2);
      if (text.startsWith("/**") && text !== "/**/") {
        const body = text
          .slice(3, -2)
          .split("\n")
          .map((l) => l.replace(/^\s*\*?\s?/, "").trimEnd())
          .filter((l) => l.length > 0)
          .join("\n");
        this.push("doc", body, start, line, column);
      }
      this.advanceTo(close + 2);
      return true;
    }

    if (this.dialect === "stylus" && /[rb]/.test(c)) {
      const raw = /^(?:br|r)(#*)"/.exec(this.source.slice(start, start + 32));
      if (raw) {
        return this.rawString(start, raw[0].length, raw[1] ?? "", line, column);
      }
      if (c === "b" && (this.char(1) === '"' || this.char(1) === "'")) {
        this.advanceTo(start + 1);
        return this.quoted(this.char(), start, line, column);
      }
    }

    if (c === '"' || (c === "'" && this.dialect === "solidity")) {
      return this.quoted(c, start, line, column);
    }

    if (c === "'") {
      return this.apostrophe(start, line, column);
    }

    if (IDENT_START.test(c)) {
      let end = start + 1;
      while (end < this.source.length && IDENT_PART.test(this.source.charAt(end))) end++;
      this.push("ident", this.source.slice(start, end), start, line, column);
      this.advanceTo(end);
      return true;
    }

    if (DIGIT.test(c)) {
      let end = start + 1;
      while (end < this.source.length) {
        const ch = this.source.charAt(end);
        if (IDENT_PART.test(ch)) {
          end++;
        } else if (ch === "." && DIGIT.test(this.source.charAt(end + 1))) {
          end += 2;
        } else {
          break;
        }
      }
      this.push("number", this.source.slice(start, end), start, line, column);
      this.advanceTo(end);
      return true;
    }

    const op = this.punct.find((p) => this.source.startsWith(p, start)) ?? c;
    this.push("punct", op, start, line, column);
    this.advanceTo(start + op.length);
    return true;
  }

  private quoted(quote: string, start: number, line: number, column: number): boolean {
    let end = this.pos + 1;
    while (end < this.source.length) {
      const ch = this.source.charAt(end);
      if (ch === "\\") {
        end += 2;
        continue;
      }
      if (ch === quote) {
        this.push("string", this.source.slice(start, end + 1), start, line, column);
        this.advanceTo(end + 1);
        return true;
      }
      end++;
    }
    return this.fail("Unterminated string literal", line, column);
  }

  private rawString(
    start: number,
    prefixLength: number,
    hashes: string,
    line: number,
    column: number
  ): boolean {
    const terminator = `"${hashes}`;
    const close = this.source.indexOf(terminator, start + prefixLength);
    if (close === -1) {
      return this.fail("Unterminated raw string literal", line, column);
    }
    const end = close + terminator.length;
    this.push("string", this.source.slice(start, end), start, line, column);
    this.advanceTo(end);
    return true;
  }

  /** Rust: a lifetime (`'a`) or a char literal (`'x'`, `'\n'`). */
  private apostrophe(start: number, line: number, column: number): boolean {
    const next = this.char(1);
    if (IDENT_START.test(next) && this.char(2) !== "'") {
      let end = start + 2;
      while (end < this.source.length && IDENT_PART.test(this.source.charAt(end))) end++;
      this.push("lifetime", this.source.slice(start, end), start, line, column);
      this.advanceTo(end);
      return true;
    }
    return this.quoted("'", start, line, column);
  }
}

export function tokenize(source: string, dialect: LexDialect): LexResult {
  return new Lexer(source, dialect).run();
}

// ============================================================================
// Bracket helpers
// ============================================================================

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS = new Set([")", "]", "}"]);

export type BracketMatch =
  | { ok: true; close: number }
  | { ok: false; index: number; message: string };

export function isOpener(token: Token | undefined): boolean {
  return token !== undefined && token.kind === "punct" && token.value in OPENERS;
}

export function isCloser(token: Token | undefined): boolean {
  return token !== undefined && token.kind === "punct" && CLOSERS.has(token.value);
}

/**
 * Find the bracket closing the one at `open`, validating every nested pair
 * on the way.
 */
export function findClosing(tokens: readonly Token[], open: number, end = tokens.length): BracketMatch {
  const stack: string[] = [];
  for (let i = open; i < end; i++) {
    const token = tokens[i];
    if (token === undefined || token.kind !== "punct") continue;
    const expected = OPENERS[token.value];
    if (expected !== undefined) {
      stack.push(expected);
      continue;
    }
    if (CLOSERS.has(token.value)) {
      const want = stack.pop();
      if (want !== token.value) {
        return {
          ok: false,
          index: i,
          message:
            want === undefined
              ? `Unexpected '${token.value}'`
              : `Expected '${want}' but found '${token.value}'`,
        };
      }
      if (stack.length === 0) {
        return { ok: true, close: i };
      }
    }
  }
  const last = stack[stack.length - 1] ?? "}";
  return { ok: false, index: end - 1, message: `Unexpected end of input, expected '${last}'` };
}

/** Lenient variant: returns `end` when the bracket is never closed. */
export function findClosingLenient(tokens: readonly Token[], open: number, end = tokens.length): number {
  let depth = 0;
  for (let i = open; i < end; i++) {
    const token = tokens[i];
    if (isOpener(token)) depth++;
    else if (isCloser(token)) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return end;
}

/** Index of the bracket opening the one that closes at `close`, or -1. */
export function findOpening(tokens: readonly Token[], close: number, start = 0): number {
  let depth = 0;
  for (let i = close; i >= start; i--) {
    const token = tokens[i];
    if (isCloser(token)) depth++;
    else if (isOpener(token)) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * First index in [from, end) at bracket depth zero whose token satisfies
 * `predicate`, or -1.
 */
export function findAtDepthZero(
  tokens: readonly Token[],
  from: number,
  end: number,
  predicate: (token: Token) => boolean
): number {
  let depth = 0;
  for (let i = from; i < end; i++) {
    const token = tokens[i];
    if (token === undefined) break;
    if (depth === 0 && predicate(token)) return i;
    if (isOpener(token)) depth++;
    else if (isCloser(token)) depth = Math.max(0, depth - 1);
  }
  return -1;
}

/** Split [lo, hi) on depth-zero commas. Empty trailing segments are dropped. */
export function splitTopLevel(
  tokens: readonly Token[],
  lo: number,
  hi: number,
  separator = ",",
  trackAngles = false
): Array<[number, number]> {
  const parts: Array<[number, number]> = [];
  let depth = 0;
  let angles = 0;
  let start = lo;
  for (let i = lo; i < hi; i++) {
    const token = tokens[i];
    if (token === undefined) break;
    if (isOpener(token)) depth++;
    else if (isCloser(token)) depth--;
    else if (trackAngles && token.kind === "punct" && token.value === "<") angles++;
    else if (trackAngles && token.kind === "punct" && token.value === ">") angles = Math.max(0, angles - 1);
    else if (depth === 0 && angles === 0 && token.kind === "punct" && token.value === separator) {
      parts.push([start, i]);
      start = i + 1;
    }
  }
  if (start < hi) parts.push([start, hi]);
  return parts;
}

// ============================================================================
// Text helpers
// ============================================================================

const SPACED = new Set([
  "==", "!=", "<=", ">=", "&&", "||", "=", "+=", "-=", "*=", "/=", "%=", "=>", "+", "-", "/", "%",
  "**", "<", ">", "|", "^",
]);

const WORDLIKE: ReadonlySet<TokenKind> = new Set<TokenKind>(["ident", "number", "string", "lifetime"]);

/** Readable, normalized text for the tokens in [lo, hi). */
export function tokensText(tokens: readonly Token[], lo: number, hi: number): string {
  let text = "";
  let previous: Token | undefined;
  for (let i = lo; i < hi; i++) {
    const token = tokens[i];
    if (token === undefined || token.kind === "doc") continue;
    if (previous !== undefined) {
      const spaced =
        previous.value === "," ||
        SPACED.has(token.value) ||
        SPACED.has(previous.value) ||
        (WORDLIKE.has(previous.kind) && WORDLIKE.has(token.kind));
      text += spaced ? ` ${token.value}` : token.value;
    } else {
      text += token.value;
    }
    previous = token;
  }
  return text;
}
