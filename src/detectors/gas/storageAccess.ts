/**
 * Storage Access Detector
 *
 * Repeated reads of a slot with no write in between, reads of a loop
 * invariant slot on every iteration, and writes inside loops.
 */

import { walkOperations } from "../../parser/operations.js";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import {
  UNKNOWN_SLOT,
  type Operation,
  type RawFinding,
  type StorageReadOp,
} from "../../types/index.js";
import { BaseDetector, type FunctionScope } from "../base.js";

function slotKey(op: { slot: string; key?: string }): string {
  return op.key === undefined ? op.slot : `${op.slot}[${op.key}]`;
}

function forget(seen: Map<string, StorageReadOp>, slots: Iterable<string>): void {
  for (const slot of slots) {
    for (const key of [...seen.keys()]) {
      if (key === slot || key.startsWith(`${slot}[`)) seen.delete(key);
    }
  }
}

/** Slots written anywhere inside `ops`, nested bodies included. */
function writtenSlots(ops: readonly Operation[]): Set<string> {
  const slots = new Set<string>();
  walkOperations(ops, (op) => {
    if (op.kind === "storage-write") slots.add(op.slot);
  });
  return slots;
}

export class StorageAccessDetector extends BaseDetector {
  readonly id = "storage-access";
  readonly name = "Storage Access";
  readonly description = "Redundant storage reads and storage writes inside loops";
  readonly category = "performance" as const;
  readonly rules = catalogRules("GAS-002", "GAS-005");

  protected override inspectFunction({ fn, context }: FunctionScope): RawFinding[] {
    const warmRead = context.costTable.lookup("storage-read:warm")?.gas ?? 0;
    const warmWrite = context.costTable.lookup("storage-write:warm")?.gas ?? 0;
    const findings: RawFinding[] = [];

    const repeated = new Map<string, StorageReadOp>();
    scanReads(fn.operations, new Map(), repeated);
    const flagged = new Set(repeated.values());
    for (const op of repeated.values()) {
      findings.push(
        this.finding(
          "GAS-002",
          op.location,
          `${fn.name} reads ${slotKey(op)} from storage again although it was not written since the last read.`,
          { estimatedGasSavings: warmRead }
        )
      );
    }

    walkOperations(fn.operations, (op, state) => {
      if (op.kind === "loop") {
        const written = writtenSlots(op.body);
        for (const read of op.body) {
          if (
            read.kind === "storage-read" &&
            read.key === undefined &&
            read.slot !== UNKNOWN_SLOT &&
            !written.has(read.slot) &&
            !flagged.has(read)
          ) {
            findings.push(
              this.finding(
                "GAS-002",
                read.location,
                `${fn.name} reads ${read.slot} on every loop iteration although the loop never changes it.`,
                { match: "partial", estimatedGasSavings: warmRead }
              )
            );
          }
        }
      }
      if (op.kind === "storage-write" && state.loopDepth > 0) {
        findings.push(
          this.finding(
            "GAS-005",
            op.location,
            `${fn.name} writes ${op.slot} inside a loop, paying for a storage write on every iteration.`,
            { estimatedGasSavings: warmWrite }
          )
        );
      }
    });
    return findings;
  }
}

/**
 * Straight-line scan for a read of a slot already read with no write since.
 * Branch arms and loop bodies see a copy of what was read before them;
 * nothing they read is assumed afterwards.
 */
function scanReads(
  ops: readonly Operation[],
  seen: Map<string, StorageReadOp>,
  repeated: Map<string, StorageReadOp>
): void {
  for (const op of ops) {
    switch (op.kind) {
      case "storage-read": {
        if (op.slot === UNKNOWN_SLOT) break;
        const key = slotKey(op);
        if (!seen.has(key)) {
          seen.set(key, op);
        } else if (!repeated.has(key)) {
          repeated.set(key, op);
        }
        break;
      }
      case "storage-write":
        forget(seen, [op.slot]);
        break;
      case "external-call":
        // The callee may re-enter and change anything.
        seen.clear();
        break;
      case "branch":
        for (const arm of op.arms) scanReads(arm, new Map(seen), repeated);
        forget(seen, writtenSlots(op.arms.flat()));
        break;
      case "loop":
        scanReads(op.body, new Map(seen), repeated);
        forget(seen, writtenSlots(op.body));
        break;
      default:
        break;
    }
  }
}
