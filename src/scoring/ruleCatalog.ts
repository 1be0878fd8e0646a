/**
 * Rule Catalog
 *
 * Fixed table of every built-in rule. The severity recorded here is the only
 * input to classification; detectors never assign severities themselves.
 */

import { Severity, type RuleDefinition } from "../types/index.js";

// ============================================================================
// Security
// ============================================================================

const SECURITY_RULES: RuleDefinition[] = [
  {
    id: "SEC-001",
    title: "Reentrancy Pattern",
    category: "security",
    severity: Severity.CRITICAL,
    recommendation:
      "Apply checks-effects-interactions: update storage before the external call, or protect the function with a reentrancy guard.",
    swcId: "SWC-107",
  },
  {
    id: "SEC-002",
    title: "Missing Access Control",
    category: "security",
    severity: Severity.HIGH,
    recommendation:
      "Restrict the function to authorized callers (owner or role check on the caller) before it changes privileged state.",
    swcId: "SWC-105",
  },
  {
    id: "SEC-003",
    title: "Unchecked Arithmetic",
    category: "security",
    severity: Severity.HIGH,
    recommendation:
      "Use checked arithmetic (checked_add/checked_sub, or Solidity >= 0.8 outside unchecked blocks) for balances and indices.",
    swcId: "SWC-101",
  },
  {
    id: "SEC-004",
    title: "Trust Boundary Violation",
    category: "security",
    severity: Severity.HIGH,
    recommendation:
      "Validate call targets against an allow-list or a fixed address before calling into them.",
  },
  {
    id: "SEC-005",
    title: "Delegate Call to Untrusted Target",
    category: "security",
    severity: Severity.CRITICAL,
    recommendation:
      "Only delegate to a constant or governance-controlled implementation address; never to caller-supplied targets.",
    swcId: "SWC-112",
  },
  {
    id: "SEC-006",
    title: "Unsafe Code",
    category: "security",
    severity: Severity.MEDIUM,
    recommendation:
      "Remove unsafe blocks, raw pointers and manual memory management, or document and test the invariants they rely on.",
  },
  {
    id: "SEC-007",
    title: "Block Value Dependence",
    category: "security",
    severity: Severity.LOW,
    recommendation:
      "Avoid block timestamps and numbers for critical decisions; on Arbitrum they follow the L1 and sequencer clocks loosely.",
    swcId: "SWC-116",
  },
  {
    id: "SEC-008",
    title: "Authorization Through tx.origin",
    category: "security",
    severity: Severity.HIGH,
    recommendation: "Authorize against msg.sender instead of tx.origin.",
    swcId: "SWC-115",
  },
];

// ============================================================================
// Performance
// ============================================================================

const PERFORMANCE_RULES: RuleDefinition[] = [
  {
    id: "GAS-001",
    title: "Function Exceeds Gas Threshold",
    category: "performance",
    severity: Severity.MEDIUM,
    recommendation:
      "Split the function, cache storage values in locals, or move work off-chain to bring its cost under the threshold.",
  },
  {
    id: "GAS-002",
    title: "Repeated Storage Read",
    category: "performance",
    severity: Severity.LOW,
    recommendation: "Read the storage value once into a local variable and reuse it.",
  },
  {
    id: "GAS-003",
    title: "Redundant External Call",
    category: "performance",
    severity: Severity.LOW,
    recommendation: "Call once and reuse the result instead of repeating an identical external call.",
  },
  {
    id: "GAS-004",
    title: "Unbounded Loop",
    category: "performance",
    severity: Severity.HIGH,
    recommendation:
      "Bound the iteration count or paginate the work so that growing state cannot push the call over the block gas limit.",
    swcId: "SWC-128",
  },
  {
    id: "GAS-005",
    title: "Storage Write in Loop",
    category: "performance",
    severity: Severity.MEDIUM,
    recommendation: "Accumulate the result in memory and write it to storage once after the loop.",
  },
  {
    id: "GAS-006",
    title: "Unestimated Operation",
    category: "performance",
    severity: Severity.LOW,
    recommendation:
      "The cost of this operation is unknown to the cost table; measure it before relying on the gas estimate.",
  },
  {
    id: "GAS-007",
    title: "Collection Without Preallocation",
    category: "performance",
    severity: Severity.LOW,
    recommendation: "Allocate with a known capacity (Vec::with_capacity) and avoid clones inside hot paths.",
  },
  {
    id: "GAS-008",
    title: "Contract Size Limit",
    category: "performance",
    severity: Severity.HIGH,
    recommendation:
      "Strip debug sections, enable size optimizations (opt-level = \"z\", LTO) and move rarely used code out of the contract.",
  },
];

// ============================================================================
// Quality
// ============================================================================

const QUALITY_RULES: RuleDefinition[] = [
  {
    id: "QA-001",
    title: "Missing Documentation",
    category: "quality",
    severity: Severity.INFORMATIONAL,
    recommendation: "Document every externally callable function with a doc comment (/// or NatSpec).",
  },
  {
    id: "QA-002",
    title: "High Cyclomatic Complexity",
    category: "quality",
    severity: Severity.LOW,
    recommendation: "Break the function into smaller helpers with fewer branches each.",
  },
  {
    id: "QA-003",
    title: "Unhandled Fallible Operation",
    category: "quality",
    severity: Severity.MEDIUM,
    recommendation:
      "Check the result of external calls and validate inputs before arithmetic that can fail.",
    swcId: "SWC-104",
  },
  {
    id: "QA-004",
    title: "Naming Convention",
    category: "quality",
    severity: Severity.INFORMATIONAL,
    recommendation: "Follow the naming conventions of the contract language.",
  },
  {
    id: "QA-005",
    title: "State Change Without Event",
    category: "quality",
    severity: Severity.LOW,
    recommendation: "Emit an event for every state change so that off-chain indexers can follow it.",
  },
];

// ============================================================================
// Lookup
// ============================================================================

export const RULE_CATALOG: ReadonlyMap<string, RuleDefinition> = new Map(
  [...SECURITY_RULES, ...PERFORMANCE_RULES, ...QUALITY_RULES].map((rule) => [
    rule.id,
    Object.freeze(rule),
  ])
);

export function getRule(id: string): RuleDefinition | undefined {
  return RULE_CATALOG.get(id);
}

/**
 * Catalog entries for the given ids. Throws on an unknown id, which can only
 * be a typo in a built-in detector.
 */
export function catalogRules(...ids: string[]): readonly RuleDefinition[] {
  return Object.freeze(
    ids.map((id) => {
      const rule = RULE_CATALOG.get(id);
      if (rule === undefined) {
        throw new Error(`Unknown rule id: ${id}`);
      }
      return rule;
    })
  );
}
