/**
 * Replicate invariant op hoisting
 *
 * Hoists ops that yield the same result(s) on every replica out of their
 * enclosing `tf_device.replicate`, so they run once instead of `n` times.
 *
 * Before hoisting, `tf.Shape` ops are made invariant where possible:
 *
 *   tf_device.replicate([%0, %1] as %ri: tensor<*xi32>) {n = 2}
 *     %2 = "tf.Shape"(%ri)
 *
 * becomes `"tf.Shape"(%0)`, and for resource variables
 *
 *   tf_device.replicate([%0, %1] as %ri: tensor<*x!tf.resource>) {n = 2}
 *     %2 = "tf.ReadVariableOp"(%ri)
 *     %3 = "tf.Shape"(%2)
 *
 * the shape becomes `"tf.VariableShape"(%0)`. The resource rewrite assumes
 * the variable is not written inside the replicate before the read (earlier
 * resource lifting leaves no such writes); `checkResourceWrites` turns that
 * assumption into a check.
 */

import {
  hasTrait,
  isOp,
  isTerminator,
  READ_VARIABLE_OP,
  REPLICATE_OP,
  SHAPE_OP,
  VARIABLE_SHAPE_OP,
} from "../dialect/ops";
import {
  getFirstReplicaOperand,
  getReplicateBody,
  getReplicateRegion,
} from "../dialect/replicate";
import { OpBuilder } from "../ir/builder";
import type { Block, IRContext, OpId, Operation, RegionId, ValueId } from "../ir/ir";
import { collectOps, walk } from "../ir/walk";
import { withConfig } from "../support/config";
import { dumpOpToFile } from "../support/dump";
import { debugLog, vlogIsOn } from "../support/logging";
import { type FunctionPass, mergeStats } from "./pass";

export const REPLICATE_INVARIANT_OP_HOISTING = {
  name: "tf-replicate-invariant-op-hoisting",
  description: "Hoists replicate invariant operations out of replicate",
} as const;

const TAG = "replicate-invariant-op-hoisting";

export type HoistOptions = {
  /**
   * Skip the ReadVariableOp -> VariableShape rewrite when the resource is
   * written earlier in the replicate body. Off by default: the rewrite then
   * relies on no such write existing.
   */
  checkResourceWrites?: boolean;
};

export type HoistStats = {
  replicatesProcessed: number;
  shapeOpsRetargeted: number;
  variableShapesCreated: number;
  hoisted: number;
};

function emptyStats(): HoistStats {
  return {
    replicatesProcessed: 0,
    shapeOpsRetargeted: 0,
    variableShapesCreated: 0,
    hoisted: 0,
  };
}

// ============================================================================
// Invariance
// ============================================================================

/**
 * True if `op` and every op nested in it only read values defined strictly
 * outside `replicateRegion`. Values without a parent region count as varying.
 */
export function isOpReplicateInvariant(
  ir: IRContext,
  replicateRegion: RegionId,
  opId: OpId,
): boolean {
  const result = walk(ir, opId, (inner) => {
    for (const operand of inner.operands) {
      const parentRegion = ir.getParentRegion(operand);
      if (
        parentRegion === undefined ||
        !ir.isProperAncestor(parentRegion, replicateRegion)
      ) {
        return "interrupt";
      }
    }
    return "advance";
  });
  return result !== "interrupt";
}

// ============================================================================
// Shape canonicalization
// ============================================================================

type ShapeInput =
  | { kind: "replicated_tensor"; argIndex: number }
  | { kind: "replicated_resource_read"; read: Operation; resource: ValueId; argIndex: number }
  | { kind: "other" };

export type ShapeRewrite =
  | { kind: "retargeted"; operand: ValueId }
  | { kind: "replaced"; variableShape: Operation }
  | { kind: "unchanged" };

function classifyShapeInput(ir: IRContext, body: Block, shapeOp: Operation): ShapeInput {
  if (shapeOp.operands.length !== 1) return { kind: "other" };
  const input = ir.getValue(shapeOp.operands[0]);
  if (input.kind === "block_arg") {
    return input.owner === body.id
      ? { kind: "replicated_tensor", argIndex: input.index }
      : { kind: "other" };
  }

  const read = ir.getOp(input.owner);
  if (!isOp(read, READ_VARIABLE_OP) || read.operands.length !== 1) {
    return { kind: "other" };
  }
  const resource = ir.getValue(read.operands[0]);
  if (resource.kind !== "block_arg" || resource.owner !== body.id) {
    return { kind: "other" };
  }
  return {
    kind: "replicated_resource_read",
    read,
    resource: resource.id,
    argIndex: resource.index,
  };
}

/** True if some resource write to `resource` precedes `read` in the body, in program order. */
function hasPriorResourceWrite(
  ir: IRContext,
  body: Block,
  read: Operation,
  resource: ValueId,
): boolean {
  let written = false;
  for (const opId of body.ops) {
    const result = walk(ir, opId, (op) => {
      if (op.id === read.id) return "interrupt";
      if (hasTrait(op, "resource_write") && op.operands[0] === resource) {
        written = true;
        return "interrupt";
      }
      return "advance";
    });
    if (result === "interrupt") break;
  }
  return written;
}

/**
 * Make a `tf.Shape` inside `replicate` invariant if its input is a replicated
 * argument (retarget to the first replica's operand) or a read of a
 * replicated resource argument (replace with `tf.VariableShape` of the first
 * replica's resource). Anything else is left alone.
 */
export function makeShapeOpInvariant(
  ir: IRContext,
  replicate: Operation,
  shapeOp: Operation,
  options: HoistOptions = {},
): ShapeRewrite {
  const body = getReplicateBody(ir, replicate);
  const input = classifyShapeInput(ir, body, shapeOp);

  switch (input.kind) {
    case "other":
      return { kind: "unchanged" };

    case "replicated_tensor": {
      const operand = getFirstReplicaOperand(replicate, input.argIndex);
      ir.setOperand(shapeOp.id, 0, operand);
      debugLog(TAG, `retargeted ${SHAPE_OP} to replicated argument ${input.argIndex}`);
      return { kind: "retargeted", operand };
    }

    case "replicated_resource_read": {
      if (
        options.checkResourceWrites &&
        hasPriorResourceWrite(ir, body, input.read, input.resource)
      ) {
        debugLog(TAG, `resource argument ${input.argIndex} is written before its read; keeping ${SHAPE_OP}`);
        return { kind: "unchanged" };
      }
      const builder = OpBuilder.before(ir, shapeOp.id);
      const variableShape = builder.create(VARIABLE_SHAPE_OP, {
        operands: [getFirstReplicaOperand(replicate, input.argIndex)],
        resultTypes: [ir.getValue(shapeOp.results[0]).type],
        loc: shapeOp.loc,
      });
      ir.replaceOpUsesWith(shapeOp.id, variableShape.id);
      ir.eraseOp(shapeOp.id);
      debugLog(TAG, `replaced ${SHAPE_OP} of resource argument ${input.argIndex} with ${VARIABLE_SHAPE_OP}`);
      return { kind: "replaced", variableShape };
    }

    default: {
      const unreachable: never = input;
      return unreachable;
    }
  }
}

// ============================================================================
// Hoisting
// ============================================================================

/**
 * Canonicalize shape ops under `replicate`, then move every invariant
 * non-terminator op of its body right before it, keeping their order.
 */
export function hoistReplicateInvariantOps(
  ir: IRContext,
  replicate: Operation,
  options: HoistOptions = {},
): HoistStats {
  const stats = emptyStats();
  stats.replicatesProcessed = 1;
  const body = getReplicateBody(ir, replicate);

  for (const shapeOp of collectOps(ir, replicate.id, (op) => isOp(op, SHAPE_OP))) {
    const rewrite = makeShapeOpInvariant(ir, replicate, shapeOp, options);
    if (rewrite.kind === "retargeted") stats.shapeOpsRetargeted++;
    if (rewrite.kind === "replaced") stats.variableShapesCreated++;
  }

  const replicateRegion = getReplicateRegion(ir, replicate).id;
  for (const opId of body.ops.slice()) {
    const op = ir.getOp(opId);
    if (isTerminator(op)) continue;

    if (isOpReplicateInvariant(ir, replicateRegion, opId)) {
      ir.moveBefore(opId, replicate.id);
      stats.hoisted++;
      debugLog(TAG, `hoisted '${op.name}'`);
    }
  }
  return stats;
}

/**
 * Process every replicate op nested anywhere in `funcId`, innermost first, so
 * ops hoisted out of an inner replicate are still considered by the enclosing
 * one within the same run.
 */
export function hoistReplicateInvariantOpsInFunction(
  ir: IRContext,
  funcId: OpId,
  options: HoistOptions = {},
): HoistStats {
  const stats = emptyStats();
  for (const replicate of collectOps(ir, funcId, (op) => isOp(op, REPLICATE_OP), "post")) {
    const replicateStats = hoistReplicateInvariantOps(ir, replicate, options);
    stats.replicatesProcessed += replicateStats.replicatesProcessed;
    stats.shapeOpsRetargeted += replicateStats.shapeOpsRetargeted;
    stats.variableShapesCreated += replicateStats.variableShapesCreated;
    stats.hoisted += replicateStats.hoisted;
  }
  return stats;
}

/**
 * Options left unset fall back to the pass context's config, so pipelines
 * built by name honor `REPLICA_HOIST_CHECK_RESOURCE_WRITES`.
 */
export function createReplicateInvariantOpHoistingPass(
  options: HoistOptions = {},
): FunctionPass {
  return {
    ...REPLICATE_INVARIANT_OP_HOISTING,
    runOnFunction(ctx) {
      if (vlogIsOn(1, ctx.config)) {
        dumpOpToFile(ctx.ir, ctx.func.id, "replicate_invariant_op_hoisting_before", ctx.config);
      }

      const stats = withConfig(ctx.config, () =>
        hoistReplicateInvariantOpsInFunction(ctx.ir, ctx.func.id, {
          checkResourceWrites: options.checkResourceWrites ?? ctx.config.checkResourceWrites,
        }),
      );
      mergeStats(ctx.stats, stats);

      if (vlogIsOn(1, ctx.config)) {
        dumpOpToFile(ctx.ir, ctx.func.id, "replicate_invariant_op_hoisting_after", ctx.config);
      }
    },
  };
}
