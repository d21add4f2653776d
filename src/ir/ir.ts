/**
 * Region-based IR arena.
 *
 * Operations, blocks, regions and values live in one `IRContext` and refer to
 * each other by stable numeric ids. Operands are value ids, so moving an
 * operation only repositions its id inside a block's op list, and erasing it
 * removes it from the arena once no result is still referenced.
 */

import {
  DetachedOperationError,
  OperationInUseError,
  UnknownEntityError,
} from "./errors";
import type { Type } from "./types";

export type ValueId = number;
export type OpId = number;
export type BlockId = number;
export type RegionId = number;

/** Free-form source location, e.g. `"model.py":12:3`. */
export type Location = string;

export const UNKNOWN_LOC: Location = "unknown";

export type Attribute =
  | { kind: "int"; value: number; width: number }
  | { kind: "string"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "type"; value: Type }
  | { kind: "array"; value: Attribute[] };

export type BlockArgument = {
  id: ValueId;
  kind: "block_arg";
  type: Type;
  owner: BlockId;
  index: number;
};

export type OpResult = {
  id: ValueId;
  kind: "op_result";
  type: Type;
  owner: OpId;
  index: number;
};

export type Value = BlockArgument | OpResult;

export type Operation = {
  id: OpId;
  name: string;
  operands: ValueId[];
  results: ValueId[];
  regions: RegionId[];
  attributes: Record<string, Attribute>;
  loc: Location;
  parentBlock: BlockId | null;
};

export type Block = {
  id: BlockId;
  args: ValueId[];
  ops: OpId[];
  parentRegion: RegionId | null;
};

export type Region = {
  id: RegionId;
  blocks: BlockId[];
  parentOp: OpId | null;
};

export type CreateOpOptions = {
  name: string;
  operands?: ValueId[];
  resultTypes?: Type[];
  attributes?: Record<string, Attribute>;
  regions?: number;
  loc?: Location;
};

export class IRContext {
  private nextId = 1;
  private readonly ops = new Map<OpId, Operation>();
  private readonly blocks = new Map<BlockId, Block>();
  private readonly regions = new Map<RegionId, Region>();
  private readonly values = new Map<ValueId, Value>();
  // value -> (user op -> number of operand slots referencing the value)
  private readonly users = new Map<ValueId, Map<OpId, number>>();

  // ==========================================================================
  // Lookup
  // ==========================================================================

  getOp(id: OpId): Operation {
    const op = this.ops.get(id);
    if (!op) throw new UnknownEntityError(`Unknown operation ${id}`);
    return op;
  }

  getBlock(id: BlockId): Block {
    const block = this.blocks.get(id);
    if (!block) throw new UnknownEntityError(`Unknown block ${id}`);
    return block;
  }

  getRegion(id: RegionId): Region {
    const region = this.regions.get(id);
    if (!region) throw new UnknownEntityError(`Unknown region ${id}`);
    return region;
  }

  getValue(id: ValueId): Value {
    const value = this.values.get(id);
    if (!value) throw new UnknownEntityError(`Unknown value ${id}`);
    return value;
  }

  hasOp(id: OpId): boolean {
    return this.ops.has(id);
  }

  hasValue(id: ValueId): boolean {
    return this.values.has(id);
  }

  get opCount(): number {
    return this.ops.size;
  }

  // ==========================================================================
  // Creation
  // ==========================================================================

  /** Create a detached operation with fresh results and empty regions. */
  createOp(options: CreateOpOptions): Operation {
    const op: Operation = {
      id: this.nextId++,
      name: options.name,
      operands: [],
      results: [],
      regions: [],
      attributes: { ...(options.attributes ?? {}) },
      loc: options.loc ?? UNKNOWN_LOC,
      parentBlock: null,
    };
    this.ops.set(op.id, op);

    for (const operand of options.operands ?? []) {
      this.getValue(operand);
      op.operands.push(operand);
      this.addUse(operand, op.id);
    }

    (options.resultTypes ?? []).forEach((type, index) => {
      const result: OpResult = {
        id: this.nextId++,
        kind: "op_result",
        type,
        owner: op.id,
        index,
      };
      this.values.set(result.id, result);
      op.results.push(result.id);
    });

    for (let i = 0; i < (options.regions ?? 0); i++) {
      const region: Region = { id: this.nextId++, blocks: [], parentOp: op.id };
      this.regions.set(region.id, region);
      op.regions.push(region.id);
    }

    return op;
  }

  /** Create a block, appending it to `regionId` when given. */
  createBlock(regionId: RegionId | null, argTypes: Type[] = []): Block {
    const block: Block = {
      id: this.nextId++,
      args: [],
      ops: [],
      parentRegion: null,
    };
    this.blocks.set(block.id, block);
    for (const type of argTypes) {
      this.addBlockArgument(block.id, type);
    }
    if (regionId !== null) {
      this.getRegion(regionId).blocks.push(block.id);
      block.parentRegion = regionId;
    }
    return block;
  }

  addBlockArgument(blockId: BlockId, type: Type): ValueId {
    const block = this.getBlock(blockId);
    const arg: BlockArgument = {
      id: this.nextId++,
      kind: "block_arg",
      type,
      owner: block.id,
      index: block.args.length,
    };
    this.values.set(arg.id, arg);
    block.args.push(arg.id);
    return arg.id;
  }

  // ==========================================================================
  // Placement
  // ==========================================================================

  appendOp(blockId: BlockId, opId: OpId): void {
    this.insertOpAt(blockId, this.getBlock(blockId).ops.length, opId);
  }

  insertOpBefore(anchorId: OpId, opId: OpId): void {
    const anchor = this.getOp(anchorId);
    if (anchor.parentBlock === null) {
      throw new DetachedOperationError(
        `Cannot insert before detached operation '${anchor.name}'`,
      );
    }
    const block = this.getBlock(anchor.parentBlock);
    this.insertOpAt(block.id, block.ops.indexOf(anchorId), opId);
  }

  insertOpAt(blockId: BlockId, index: number, opId: OpId): void {
    const op = this.getOp(opId);
    if (op.parentBlock !== null) {
      throw new Error(`Operation '${op.name}' is already in a block`);
    }
    const block = this.getBlock(blockId);
    block.ops.splice(index, 0, opId);
    op.parentBlock = block.id;
  }

  /** Remove an operation from its block without destroying it. */
  detachOp(opId: OpId): void {
    const op = this.getOp(opId);
    if (op.parentBlock === null) return;
    const block = this.getBlock(op.parentBlock);
    block.ops.splice(block.ops.indexOf(opId), 1);
    op.parentBlock = null;
  }

  /** Move an operation (and everything nested in it) right before `anchorId`. */
  moveBefore(opId: OpId, anchorId: OpId): void {
    if (opId === anchorId) return;
    if (this.getOp(anchorId).parentBlock === null) {
      throw new DetachedOperationError(
        `Cannot move before detached operation '${this.getOp(anchorId).name}'`,
      );
    }
    this.detachOp(opId);
    this.insertOpBefore(anchorId, opId);
  }

  moveToEnd(opId: OpId, blockId: BlockId): void {
    this.detachOp(opId);
    this.appendOp(blockId, opId);
  }

  // ==========================================================================
  // Use-def
  // ==========================================================================

  setOperand(opId: OpId, index: number, valueId: ValueId): void {
    const op = this.getOp(opId);
    if (index < 0 || index >= op.operands.length) {
      throw new RangeError(
        `Operand index ${index} out of range for '${op.name}' with ${op.operands.length} operands`,
      );
    }
    this.getValue(valueId);
    this.dropUse(op.operands[index], opId);
    op.operands[index] = valueId;
    this.addUse(valueId, opId);
  }

  replaceAllUsesWith(from: ValueId, to: ValueId): void {
    if (from === to) return;
    for (const userId of this.getUsers(from)) {
      const user = this.getOp(userId);
      user.operands.forEach((operand, index) => {
        if (operand === from) this.setOperand(userId, index, to);
      });
    }
  }

  /** Redirect every use of `oldOpId`'s results to the matching result of `newOpId`. */
  replaceOpUsesWith(oldOpId: OpId, newOpId: OpId): void {
    const oldOp = this.getOp(oldOpId);
    const newOp = this.getOp(newOpId);
    if (oldOp.results.length !== newOp.results.length) {
      throw new Error(
        `Cannot replace '${oldOp.name}' with '${newOp.name}': result counts differ`,
      );
    }
    oldOp.results.forEach((result, i) => {
      this.replaceAllUsesWith(result, newOp.results[i]);
    });
  }

  getUsers(valueId: ValueId): OpId[] {
    return Array.from(this.users.get(valueId)?.keys() ?? []);
  }

  hasUses(valueId: ValueId): boolean {
    return (this.users.get(valueId)?.size ?? 0) > 0;
  }

  getDefiningOp(valueId: ValueId): Operation | undefined {
    const value = this.getValue(valueId);
    return value.kind === "op_result" ? this.getOp(value.owner) : undefined;
  }

  // ==========================================================================
  // Erasure
  // ==========================================================================

  /**
   * Erase an operation together with everything nested in it. Its results
   * must have no remaining uses outside of the erased subtree.
   */
  eraseOp(opId: OpId): void {
    const subtree = this.collectSubtree(opId);
    const inSubtree = new Set(subtree);
    for (const id of subtree) {
      const op = this.getOp(id);
      for (const result of op.results) {
        const outside = this.getUsers(result).filter((u) => !inSubtree.has(u));
        if (outside.length > 0) {
          throw new OperationInUseError(
            `Cannot erase '${op.name}': result #${this.getValue(result).index} still has ${outside.length} use(s)`,
          );
        }
      }
    }

    this.detachOp(opId);
    for (const id of subtree) {
      const op = this.getOp(id);
      for (const operand of op.operands) {
        this.dropUse(operand, id);
      }
    }
    for (const id of subtree) {
      const op = this.getOp(id);
      for (const result of op.results) {
        this.values.delete(result);
        this.users.delete(result);
      }
      for (const regionId of op.regions) {
        for (const blockId of this.getRegion(regionId).blocks) {
          for (const arg of this.getBlock(blockId).args) {
            this.values.delete(arg);
            this.users.delete(arg);
          }
          this.blocks.delete(blockId);
        }
        this.regions.delete(regionId);
      }
      this.ops.delete(id);
    }
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  /** Region that contains the definition of a value, if it is attached. */
  getParentRegion(valueId: ValueId): RegionId | undefined {
    const value = this.getValue(valueId);
    const blockId =
      value.kind === "block_arg" ? value.owner : this.getOp(value.owner).parentBlock;
    if (blockId === null) return undefined;
    return this.getBlock(blockId).parentRegion ?? undefined;
  }

  /** Region that (directly) contains the operation, if attached. */
  getOpParentRegion(opId: OpId): RegionId | undefined {
    const parentBlock = this.getOp(opId).parentBlock;
    if (parentBlock === null) return undefined;
    return this.getBlock(parentBlock).parentRegion ?? undefined;
  }

  getParentOp(opId: OpId): Operation | undefined {
    const regionId = this.getOpParentRegion(opId);
    if (regionId === undefined) return undefined;
    const parentOp = this.getRegion(regionId).parentOp;
    return parentOp === null ? undefined : this.getOp(parentOp);
  }

  /** True if `ancestor` strictly encloses `region`. */
  isProperAncestor(ancestor: RegionId, region: RegionId): boolean {
    let current: RegionId | undefined = region;
    while (current !== undefined) {
      const parentOp = this.getRegion(current).parentOp;
      if (parentOp === null) return false;
      current = this.getOpParentRegion(parentOp);
      if (current === ancestor) return true;
    }
    return false;
  }

  private collectSubtree(opId: OpId): OpId[] {
    const out: OpId[] = [];
    const stack: OpId[] = [opId];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      out.push(id);
      for (const regionId of this.getOp(id).regions) {
        for (const blockId of this.getRegion(regionId).blocks) {
          stack.push(...this.getBlock(blockId).ops);
        }
      }
    }
    return out;
  }

  private addUse(valueId: ValueId, opId: OpId): void {
    let opUses = this.users.get(valueId);
    if (!opUses) {
      opUses = new Map();
      this.users.set(valueId, opUses);
    }
    opUses.set(opId, (opUses.get(opId) ?? 0) + 1);
  }

  private dropUse(valueId: ValueId, opId: OpId): void {
    const opUses = this.users.get(valueId);
    const count = opUses?.get(opId);
    if (!opUses || count === undefined) return;
    if (count <= 1) {
      opUses.delete(opId);
    } else {
      opUses.set(opId, count - 1);
    }
  }
}
