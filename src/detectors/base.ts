/**
 * Detector base class
 *
 * Template for the built-in detectors: walks the functions of a model,
 * checking the abort signal between functions, then gives the subclass a
 * chance to inspect contract-level structure.
 */

import type {
  Category,
  ContractModel,
  Detector,
  DetectorContext,
  FunctionCostEstimate,
  FunctionModel,
  MatchStrength,
  Confidence,
  RawFinding,
  RuleDefinition,
  SourceLocation,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

/** What a detector sees while inspecting one function. */
export interface FunctionScope {
  model: ContractModel;
  fn: FunctionModel;
  /** Position of `fn` in `model.functions` */
  index: number;
  /** Cost estimate of `fn`; estimates are in function order */
  cost: FunctionCostEstimate | undefined;
  context: DetectorContext;
}

export interface FindingDetails {
  match?: MatchStrength;
  confidence?: Confidence;
  estimatedGasSavings?: number;
}

// ============================================================================
// Base Class
// ============================================================================

export abstract class BaseDetector implements Detector {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly category: Category;
  abstract readonly rules: readonly RuleDefinition[];

  inspect(model: ContractModel, context: DetectorContext): RawFinding[] {
    const findings: RawFinding[] = [];

    model.functions.forEach((fn, index) => {
      context.throwIfAborted();
      findings.push(
        ...this.inspectFunction({ model, fn, index, cost: context.costs.functions[index], context })
      );
    });

    context.throwIfAborted();
    findings.push(...this.inspectContract(model, context));
    return findings;
  }

  /** Per-function checks. Override in subclasses. */
  protected inspectFunction(_scope: FunctionScope): RawFinding[] {
    return [];
  }

  /** Contract-level checks, run after every function. */
  protected inspectContract(_model: ContractModel, _context: DetectorContext): RawFinding[] {
    return [];
  }

  protected finding(
    ruleId: string,
    location: SourceLocation,
    description: string,
    details: FindingDetails = {}
  ): RawFinding {
    return {
      ruleId,
      location,
      description,
      match: details.match ?? "full",
      confidence: details.confidence ?? "high",
      ...(details.estimatedGasSavings !== undefined
        ? { estimatedGasSavings: details.estimatedGasSavings }
        : {}),
    };
  }
}

// ============================================================================
// Shared predicates
// ============================================================================

/** Entry points callable from outside the contract. */
export function isEntryPoint(fn: FunctionModel): boolean {
  return fn.visibility === "public" || fn.visibility === "external";
}

export function isReadOnly(fn: FunctionModel): boolean {
  return fn.mutability === "view" || fn.mutability === "pure";
}

/** True when `text` mentions the identifier `name` as a whole word. */
function mentions(text: string, name: string): boolean {
  if (name.length === 0) return false;
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^\\w$])${escaped}($|[^\\w$])`).test(text);
}

/** True when `text` is influenced by the caller: a parameter or the sent value. */
export function callerInfluenced(text: string, fn: FunctionModel): boolean {
  if (/msg\.value|msg::value|msg_value/.test(text)) return true;
  return fn.parameters.some((param) => mentions(text, param.name));
}
