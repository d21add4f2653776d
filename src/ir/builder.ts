import type {
  Attribute,
  Block,
  BlockId,
  IRContext,
  Location,
  OpId,
  Operation,
  RegionId,
  ValueId,
} from "./ir";
import type { Type } from "./types";

type InsertionPoint =
  | { kind: "before"; op: OpId }
  | { kind: "end"; block: BlockId }
  | { kind: "detached" };

export type BuildOptions = {
  operands?: ValueId[];
  resultTypes?: Type[];
  attributes?: Record<string, Attribute>;
  regions?: number;
  loc?: Location;
};

/**
 * Creates operations at an insertion point. Ops created "before" an anchor
 * keep their creation order, all landing ahead of the anchor.
 */
export class OpBuilder {
  private insertion: InsertionPoint = { kind: "detached" };

  constructor(readonly ir: IRContext) {}

  static before(ir: IRContext, opId: OpId): OpBuilder {
    const builder = new OpBuilder(ir);
    builder.setInsertionPointBefore(opId);
    return builder;
  }

  static atEnd(ir: IRContext, blockId: BlockId): OpBuilder {
    const builder = new OpBuilder(ir);
    builder.setInsertionPointToEnd(blockId);
    return builder;
  }

  setInsertionPointBefore(opId: OpId): void {
    this.insertion = { kind: "before", op: opId };
  }

  setInsertionPointToEnd(blockId: BlockId): void {
    this.insertion = { kind: "end", block: blockId };
  }

  setInsertionPointToStart(blockId: BlockId): void {
    const first = this.ir.getBlock(blockId).ops[0];
    this.insertion =
      first === undefined
        ? { kind: "end", block: blockId }
        : { kind: "before", op: first };
  }

  clearInsertionPoint(): void {
    this.insertion = { kind: "detached" };
  }

  create(name: string, options: BuildOptions = {}): Operation {
    const op = this.ir.createOp({ name, ...options });
    switch (this.insertion.kind) {
      case "before":
        this.ir.insertOpBefore(this.insertion.op, op.id);
        break;
      case "end":
        this.ir.appendOp(this.insertion.block, op.id);
        break;
      case "detached":
        break;
    }
    return op;
  }

  /** Create a block at the end of `regionId` and move the insertion point into it. */
  createBlock(regionId: RegionId, argTypes: Type[] = []): Block {
    const block = this.ir.createBlock(regionId, argTypes);
    this.setInsertionPointToEnd(block.id);
    return block;
  }
}

export function intAttr(value: number, width = 64): Attribute {
  return { kind: "int", value, width };
}

export function stringAttr(value: string): Attribute {
  return { kind: "string", value };
}

export function boolAttr(value: boolean): Attribute {
  return { kind: "bool", value };
}

export function typeAttr(value: Type): Attribute {
  return { kind: "type", value };
}

export function arrayAttr(value: Attribute[]): Attribute {
  return { kind: "array", value };
}
