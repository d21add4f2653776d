/**
 * `tf_device.replicate` accessors.
 *
 * Operand layout: for replicated argument `i` and replica `r`, the operand
 * sits at flat position `i * n + r`. Results follow the same layout over the
 * values returned by the body terminator.
 */

import { intAttr, type OpBuilder } from "../ir/builder";
import { InvalidReplicateError } from "../ir/errors";
import type { Block, IRContext, Location, Operation, Region, ValueId } from "../ir/ir";
import type { Type } from "../ir/types";
import { DEVICE_RETURN_OP, REPLICATE_OP } from "./ops";

export type ReplicateHandle = {
  op: Operation;
  body: Block;
};

export type CreateReplicateOptions = {
  /** One entry per replicated argument, each holding `n` per-replica values. */
  replicatedInputs: ValueId[][];
  n: number;
  /** Per-replica result types; the op gets `resultTypes.length * n` results. */
  resultTypes?: Type[];
  loc?: Location;
};

export function createReplicate(
  builder: OpBuilder,
  options: CreateReplicateOptions,
): ReplicateHandle {
  const { replicatedInputs, n, resultTypes = [], loc } = options;
  const ir = builder.ir;
  for (const inputs of replicatedInputs) {
    if (inputs.length !== n) {
      throw new InvalidReplicateError(
        `Replicated input has ${inputs.length} values, expected ${n}`,
      );
    }
  }

  const op = builder.create(REPLICATE_OP, {
    operands: replicatedInputs.flat(),
    resultTypes: resultTypes.flatMap((type) => new Array<Type>(n).fill(type)),
    attributes: { n: intAttr(n, 32) },
    regions: 1,
    loc,
  });
  const argTypes = replicatedInputs.map((inputs) => ir.getValue(inputs[0]).type);
  const body = ir.createBlock(op.regions[0], argTypes);
  return { op, body };
}

/** Terminate a replicate body with `tf_device.return`. */
export function createDeviceReturn(
  builder: OpBuilder,
  operands: ValueId[] = [],
): Operation {
  return builder.create(DEVICE_RETURN_OP, { operands });
}

export function getReplicaCount(op: Operation): number {
  const attr = op.attributes.n;
  if (attr?.kind !== "int" || attr.value < 1) {
    throw new InvalidReplicateError(
      `'${op.name}' op requires a positive integer attribute 'n'`,
    );
  }
  return attr.value;
}

export function getReplicateRegion(ir: IRContext, op: Operation): Region {
  const regionId = op.regions[0];
  if (regionId === undefined) {
    throw new InvalidReplicateError(`'${op.name}' op has no body region`);
  }
  return ir.getRegion(regionId);
}

export function getReplicateBody(ir: IRContext, op: Operation): Block {
  const blockId = getReplicateRegion(ir, op).blocks[0];
  if (blockId === undefined) {
    throw new InvalidReplicateError(`'${op.name}' op has an empty body region`);
  }
  return ir.getBlock(blockId);
}

/** Operand bound to replicated argument `argIndex` for replica 0. */
export function getFirstReplicaOperand(op: Operation, argIndex: number): ValueId {
  return getReplicaOperand(op, argIndex, 0);
}

export function getReplicaOperand(
  op: Operation,
  argIndex: number,
  replica: number,
): ValueId {
  const n = getReplicaCount(op);
  const operand = op.operands[argIndex * n + replica];
  if (operand === undefined) {
    throw new InvalidReplicateError(
      `'${op.name}' op has no operand for argument ${argIndex}, replica ${replica}`,
    );
  }
  return operand;
}
