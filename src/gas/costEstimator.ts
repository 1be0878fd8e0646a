/**
 * Cost Estimator
 *
 * Walks each function's operation tree and prices it against an
 * instruction cost table. Storage accesses are cold on first touch of a
 * slot and key within the function and warm afterwards.
 */

import { MAX_LOOP_ITERATIONS, type AnalysisOptions } from "../config/schema.js";
import {
  UNKNOWN_SLOT,
  type ContractModel,
  type CostReport,
  type FunctionCostEstimate,
  type FunctionModel,
  type Operation,
  type OperationCost,
  type UnestimatedOperation,
} from "../types/index.js";
import { costKey, INK_PER_GAS, type InstructionCostTable } from "./costTable.js";

export type EstimatorOptions = Pick<
  AnalysisOptions,
  "assumedLoopIterations" | "carbonCoefficient" | "defaultOperationCost"
>;

interface Tally {
  gas: number;
  /** Gas scaled by each operation's environmental weight */
  weighted: number;
}

const ZERO: Tally = { gas: 0, weighted: 0 };

/** Totals saturate rather than leave the safe-integer range. */
function saturate(value: number): number {
  return Math.min(value, Number.MAX_SAFE_INTEGER);
}

function add(a: Tally, b: Tally): Tally {
  return { gas: saturate(a.gas + b.gas), weighted: saturate(a.weighted + b.weighted) };
}

function scale(tally: Tally, factor: number): Tally {
  return { gas: saturate(tally.gas * factor), weighted: saturate(tally.weighted * factor) };
}

function roundImpact(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

// ============================================================================
// Per-function walk
// ============================================================================

class FunctionEstimator {
  private readonly priced = new Map<number, OperationCost>();
  readonly unestimated: UnestimatedOperation[] = [];

  constructor(
    private readonly fn: FunctionModel,
    private readonly table: InstructionCostTable,
    private readonly options: EstimatorOptions
  ) {}

  get operations(): OperationCost[] {
    return [...this.priced.values()].sort((a, b) => a.operationId - b.operationId);
  }

  /**
   * Cost of running `ops` once. `warm` holds the storage keys already touched
   * and is updated in place. Only the first pass over an operation is recorded.
   */
  sequence(ops: readonly Operation[], warm: Set<string>, record: boolean): Tally {
    return ops.reduce((total, op) => add(total, this.operation(op, warm, record)), ZERO);
  }

  private operation(op: Operation, warm: Set<string>, record: boolean): Tally {
    switch (op.kind) {
      case "loop": {
        const overhead = this.price(op, costKey(op), record);
        const iterations = Math.min(op.iterations ?? this.options.assumedLoopIterations, MAX_LOOP_ITERATIONS);
        if (iterations === 0) return overhead;
        const first = this.sequence(op.body, warm, record);
        const rest = this.sequence(op.body, new Set(warm), false);
        return add(add(scale(overhead, iterations), first), scale(rest, iterations - 1));
      }
      case "branch": {
        const overhead = this.price(op, costKey(op), record);
        const outcomes = op.arms.map((arm) => {
          const armWarm = new Set(warm);
          return { tally: this.sequence(arm, armWarm, record), warm: armWarm };
        });
        for (const outcome of outcomes) {
          for (const key of outcome.warm) warm.add(key);
        }
        const worst = outcomes.reduce<Tally>(
          (max, outcome) => (outcome.tally.gas > max.gas ? outcome.tally : max),
          ZERO
        );
        return add(overhead, worst);
      }
      case "storage-read":
      case "storage-write": {
        const slotKey = `${op.slot}[${op.key ?? ""}]`;
        const temperature = op.slot !== UNKNOWN_SLOT && warm.has(slotKey) ? "warm" : "cold";
        if (op.slot !== UNKNOWN_SLOT) warm.add(slotKey);
        return this.price(op, costKey(op, temperature), record);
      }
      default:
        return this.price(op, costKey(op), record);
    }
  }

  private price(op: Operation, key: string, record: boolean): Tally {
    const entry = this.table.lookup(key);
    const gas = entry?.gas ?? this.options.defaultOperationCost;
    const weight = entry?.environmentalWeight ?? 1;

    if (record && !this.priced.has(op.id)) {
      this.priced.set(op.id, {
        operationId: op.id,
        kind: op.kind,
        costKey: key,
        gas,
        estimated: entry !== undefined,
        location: op.location,
      });
      if (entry === undefined) {
        this.unestimated.push({
          function: this.fn.name,
          operationId: op.id,
          costKey: key,
          location: op.location,
        });
      }
    }
    return { gas, weighted: gas * weight };
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Price every function of a model. Pure: the same model, table and options
 * always give the same report.
 */
export function estimateCosts(
  model: ContractModel,
  table: InstructionCostTable,
  options: EstimatorOptions
): CostReport {
  const functions: FunctionCostEstimate[] = [];
  const unestimated: UnestimatedOperation[] = [];
  let total = ZERO;

  for (const fn of model.functions) {
    const estimator = new FunctionEstimator(fn, table, options);
    const tally = estimator.sequence(fn.operations, new Set(), true);
    total = add(total, tally);
    unestimated.push(...estimator.unestimated);
    functions.push({
      function: fn.name,
      gas: tally.gas,
      ink: saturate(tally.gas * INK_PER_GAS),
      environmentalImpact: roundImpact(tally.weighted * options.carbonCoefficient),
      operations: estimator.operations,
    });
  }

  return {
    totalGas: total.gas,
    totalInk: saturate(total.gas * INK_PER_GAS),
    environmentalImpact: roundImpact(total.weighted * options.carbonCoefficient),
    functions,
    unestimated,
  };
}
