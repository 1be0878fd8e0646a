/**
 * Front-end contract
 *
 * Each dialect front end turns raw input into a `ParsedContract`; the model
 * builder then derives control flow, storage access patterns and call sites.
 */

import type {
  ConstantDeclaration,
  Diagnostic,
  FunctionModel,
  ParseError,
  SourceLocation,
  StorageTypeClass,
} from "../types/index.js";
import type { Token } from "./lexer.js";

export type { ConstantDeclaration };

// ============================================================================
// Types
// ============================================================================

export interface StorageDeclaration {
  name: string;
  declaredType: string;
  typeClass: StorageTypeClass;
  location: SourceLocation;
}

export type ParsedFunction = Omit<FunctionModel, "controlFlow">;

export interface ParsedContract {
  name: string;
  functions: ParsedFunction[];
  storage: StorageDeclaration[];
  constants: ConstantDeclaration[];
  diagnostics: Diagnostic[];
}

// ============================================================================
// Helpers
// ============================================================================

export function tokenLocation(token: Token | undefined, file: string, fn?: string): SourceLocation {
  const location: SourceLocation = {
    file,
    line: token?.line ?? 1,
    column: token?.column ?? 1,
  };
  return fn === undefined ? location : { ...location, function: fn };
}

export function parseDiagnostic(message: string, location?: SourceLocation): Diagnostic {
  return location === undefined
    ? { code: "PARSE_ERROR", message }
    : { code: "PARSE_ERROR", message, location };
}

export function fatalParseError(
  message: string,
  diagnostics: Diagnostic[],
  location?: SourceLocation
): ParseError {
  return location === undefined
    ? { code: "PARSE_ERROR", message, diagnostics }
    : { code: "PARSE_ERROR", message, location, diagnostics };
}

/** Joined text of the doc tokens collected before an item, if any. */
export function documentation(docs: readonly string[]): string | undefined {
  const text = docs.join("\n").trim();
  return text.length > 0 ? text : undefined;
}

const MAPPING_TYPE = /^(mapping\b|StorageMap\b)/;
const ARRAY_TYPE = /(\[\s*\d*\s*\]$|^StorageVec\b|^StorageArray\b)/;

export function classifyStorageType(declaredType: string): StorageTypeClass {
  const type = declaredType.trim();
  if (MAPPING_TYPE.test(type)) return "mapping";
  if (ARRAY_TYPE.test(type)) return "array";
  return "value";
}
