/**
 * Operation tree traversal
 */

import type { FunctionModel, Operation, OperationKind } from "../types/index.js";

export interface WalkState {
  /** Number of enclosing loops */
  loopDepth: number;
  /** Enclosing branch or loop operations, outermost first */
  ancestors: readonly Operation[];
}

/** Pre-order walk: each operation before the operations nested in it. */
export function walkOperations(
  operations: readonly Operation[],
  visit: (op: Operation, state: WalkState) => void,
  state: WalkState = { loopDepth: 0, ancestors: [] }
): void {
  for (const op of operations) {
    visit(op, state);
    if (op.kind === "loop") {
      walkOperations(op.body, visit, {
        loopDepth: state.loopDepth + 1,
        ancestors: [...state.ancestors, op],
      });
    } else if (op.kind === "branch") {
      for (const arm of op.arms) {
        walkOperations(arm, visit, { loopDepth: state.loopDepth, ancestors: [...state.ancestors, op] });
      }
    }
  }
}

export function flattenOperations(operations: readonly Operation[]): Operation[] {
  const flat: Operation[] = [];
  walkOperations(operations, (op) => flat.push(op));
  return flat;
}

/** All operations of one kind, in pre-order, narrowed to that kind. */
export function operationsOfKind<K extends OperationKind>(
  fn: Pick<FunctionModel, "operations">,
  kind: K
): Array<Extract<Operation, { kind: K }>> {
  const matches: Array<Extract<Operation, { kind: K }>> = [];
  walkOperations(fn.operations, (op) => {
    if (isKind(op, kind)) matches.push(op);
  });
  return matches;
}

export function isKind<K extends OperationKind>(
  op: Operation,
  kind: K
): op is Extract<Operation, { kind: K }> {
  return op.kind === kind;
}

/** True when the function writes storage. */
export function mutatesState(fn: Pick<FunctionModel, "operations">): boolean {
  return operationsOfKind(fn, "storage-write").length > 0;
}
