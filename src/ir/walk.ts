import type { IRContext, OpId, Operation } from "./ir";

/**
 * Walk control:
 * - "advance": keep walking, descending into the op's regions
 * - "skip": keep walking, but do not descend into this op
 * - "interrupt": stop the whole walk
 */
export type WalkResult = "advance" | "skip" | "interrupt";

export type WalkCallback = (op: Operation) => WalkResult | void;

/**
 * Pre-order walk over `rootId` and every operation nested in its regions.
 *
 * Block op lists are snapshotted before they are visited, so the callback may
 * move or erase the op it is handed; erased ops are not descended into.
 */
export function walk(ir: IRContext, rootId: OpId, callback: WalkCallback): WalkResult {
  const result = callback(ir.getOp(rootId)) ?? "advance";
  if (result !== "advance") {
    return result === "interrupt" ? "interrupt" : "advance";
  }
  if (!ir.hasOp(rootId)) return "advance";

  for (const regionId of ir.getOp(rootId).regions) {
    for (const blockId of ir.getRegion(regionId).blocks.slice()) {
      for (const opId of ir.getBlock(blockId).ops.slice()) {
        if (!ir.hasOp(opId)) continue;
        if (walk(ir, opId, callback) === "interrupt") return "interrupt";
      }
    }
  }
  return "advance";
}

export function wasInterrupted(result: WalkResult): boolean {
  return result === "interrupt";
}

export type WalkOrder = "pre" | "post";

function visitPostOrder(ir: IRContext, opId: OpId, visit: (op: Operation) => void): void {
  for (const regionId of ir.getOp(opId).regions) {
    for (const blockId of ir.getRegion(regionId).blocks) {
      for (const childId of ir.getBlock(blockId).ops) {
        visitPostOrder(ir, childId, visit);
      }
    }
  }
  visit(ir.getOp(opId));
}

/**
 * Collect every op under (and including) `rootId` that matches `predicate`.
 * Pre-order lists a parent before its nested ops; post-order lists nested
 * ops first.
 */
export function collectOps<T extends Operation>(
  ir: IRContext,
  rootId: OpId,
  predicate: (op: Operation) => op is T,
  order?: WalkOrder,
): T[];
export function collectOps(
  ir: IRContext,
  rootId: OpId,
  predicate: (op: Operation) => boolean,
  order?: WalkOrder,
): Operation[];
export function collectOps(
  ir: IRContext,
  rootId: OpId,
  predicate: (op: Operation) => boolean,
  order: WalkOrder = "pre",
): Operation[] {
  const out: Operation[] = [];
  const visit = (op: Operation): void => {
    if (predicate(op)) out.push(op);
  };
  if (order === "post") {
    visitPostOrder(ir, rootId, visit);
  } else {
    walk(ir, rootId, visit);
  }
  return out;
}
