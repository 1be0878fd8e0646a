/**
 * Core types for the contract analysis engine
 */

export enum Severity {
  CRITICAL = "critical",
  HIGH = "high",
  MEDIUM = "medium",
  LOW = "low",
  INFORMATIONAL = "informational",
}

export type Confidence = "high" | "medium" | "low";

/** Detector families. "performance" covers gas and scalability checks. */
export type Category = "security" | "performance" | "quality";

export const CATEGORIES: readonly Category[] = ["security", "performance", "quality"];

/** Whether a detector saw the whole pattern or only part of it. */
export type MatchStrength = "full" | "partial";

export type Dialect = "stylus" | "solidity" | "wasm";

export type DialectHint = Dialect | "auto";

export type Visibility = "public" | "private" | "internal" | "external";

export type StateMutability = "pure" | "view" | "payable" | "nonpayable";

/**
 * Position in the analyzed input. Binary artifacts have a single line and the
 * column is the 1-based byte offset.
 */
export interface SourceLocation {
  file: string;
  line: number;
  column: number;
  function?: string;
}

export interface Finding {
  /** Deterministic id: rule, file, line and column */
  id: string;
  ruleId: string;
  title: string;
  category: Category;
  severity: Severity;
  confidence: Confidence;
  match: MatchStrength;
  description: string;
  location: SourceLocation;
  recommendation: string;
  detector: string;
  estimatedGasSavings?: number;
  swcId?: string;
  /** Ids of findings from other categories in the same function */
  correlatedWith?: string[];
}

export type DiagnosticCode =
  | "PARSE_ERROR"
  | "UNSUPPORTED_CONSTRUCT"
  | "DETECTOR_TIMEOUT"
  | "DETECTOR_FAILED"
  | "CONTRACT_TIMEOUT"
  | "UNKNOWN_RULE";

/** Non-fatal problem recorded while building or analyzing a model. */
export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  location?: SourceLocation;
  detector?: string;
}

// ============================================================================
// Errors
// ============================================================================

export interface ParseError {
  code: "PARSE_ERROR";
  message: string;
  location?: SourceLocation;
  diagnostics: Diagnostic[];
}

export interface ConfigurationError {
  code: "CONFIGURATION_ERROR";
  message: string;
  issues: string[];
}

export type EngineError = ParseError | ConfigurationError;

export * from "./ir.js";
export * from "./report.js";
export * from "./detector.js";
export * from "./result.js";
