import { getOpDef, getTerminator, isOp, isTerminator, MODULE_OP, REPLICATE_OP } from "../dialect/ops";
import { getReplicaCount } from "../dialect/replicate";
import { InvalidReplicateError, IRVerificationError } from "./errors";
import type { IRContext, OpId, Operation } from "./ir";
import { walk } from "./walk";

/**
 * Structural checks over `rootId` and everything nested in it. Returns one
 * message per problem; an empty list means the IR is well formed.
 *
 * Dominance is checked within single blocks: an op result is visible to a
 * use if the defining op comes earlier in the block that holds the use (or
 * one of the use's enclosing ops).
 */
export function verify(ir: IRContext, rootId: OpId): string[] {
  const diagnostics: string[] = [];
  walk(ir, rootId, (op) => {
    verifyOperands(ir, op, diagnostics);
    verifyRegions(ir, op, diagnostics);
    if (isOp(op, REPLICATE_OP)) verifyReplicate(ir, op, diagnostics);
  });
  return diagnostics;
}

export function verifyOrThrow(ir: IRContext, rootId: OpId, context?: string): void {
  const diagnostics = verify(ir, rootId);
  if (diagnostics.length > 0) {
    throw new IRVerificationError(diagnostics, context);
  }
}

function verifyOperands(ir: IRContext, op: Operation, out: string[]): void {
  op.operands.forEach((operand, i) => {
    if (!ir.hasValue(operand)) {
      out.push(`'${op.name}' op operand #${i} refers to an erased value`);
      return;
    }
    const value = ir.getValue(operand);
    const defBlock =
      value.kind === "block_arg" ? value.owner : ir.getOp(value.owner).parentBlock;
    if (defBlock === null) {
      out.push(`'${op.name}' op operand #${i} is defined by a detached operation`);
      return;
    }

    // Climb from the user until reaching the op that sits in the defining block.
    let user: Operation | undefined = op;
    while (user && user.parentBlock !== defBlock) {
      user = ir.getParentOp(user.id);
    }
    if (!user) {
      out.push(`'${op.name}' op operand #${i} is not visible from this use`);
      return;
    }
    if (value.kind === "op_result") {
      const ops = ir.getBlock(defBlock).ops;
      if (ops.indexOf(value.owner) >= ops.indexOf(user.id)) {
        out.push(`'${op.name}' op operand #${i} does not dominate this use`);
      }
    }
  });
}

function verifyRegions(ir: IRContext, op: Operation, out: string[]): void {
  const def = getOpDef(op.name);
  if (def?.regions !== undefined && def.regions !== op.regions.length) {
    out.push(`'${op.name}' op expects ${def.regions} region(s), found ${op.regions.length}`);
  }
  const needsTerminator = def !== undefined && !isOp(op, MODULE_OP);

  for (const regionId of op.regions) {
    ir.getRegion(regionId).blocks.forEach((blockId, b) => {
      const ops = ir.getBlock(blockId).ops.map((id) => ir.getOp(id));
      ops.slice(0, -1).forEach((inner) => {
        if (isTerminator(inner)) {
          out.push(`'${inner.name}' op must be the last operation in its block`);
        }
      });
      if (needsTerminator && !getTerminator(ir, blockId)) {
        out.push(`'${op.name}' op block ^bb${b} must end with a terminator`);
      }
    });
  }
}

function verifyReplicate(ir: IRContext, op: Operation, out: string[]): void {
  let n: number;
  try {
    n = getReplicaCount(op);
  } catch (err) {
    if (err instanceof InvalidReplicateError) {
      out.push(err.message);
      return;
    }
    throw err;
  }

  const blockId = op.regions.length > 0 ? ir.getRegion(op.regions[0]).blocks[0] : undefined;
  if (blockId === undefined) {
    out.push(`'${op.name}' op has an empty body region`);
    return;
  }
  const numArgs = ir.getBlock(blockId).args.length;
  if (op.operands.length !== numArgs * n) {
    out.push(
      `'${op.name}' op expects ${numArgs * n} operands (${numArgs} arguments x ${n} replicas), found ${op.operands.length}`,
    );
  }
  const terminator = getTerminator(ir, blockId);
  if (terminator && op.results.length !== terminator.operands.length * n) {
    out.push(
      `'${op.name}' op expects ${terminator.operands.length * n} results, found ${op.results.length}`,
    );
  }
}
