import type { BlockId, IRContext, Operation } from "../ir/ir";

export type OpTrait =
  /** Must close its block */
  | "terminator"
  /** Writes the resource passed as operand #0 */
  | "resource_write"
  /** No side effects */
  | "pure";

export type OpDef = {
  name: string;
  summary: string;
  traits: readonly OpTrait[];
  /** Number of regions the op carries */
  regions?: number;
};

export const OP_DEFS = [
  // builtin / func
  { name: "builtin.module", summary: "Top-level container", traits: [], regions: 1 },
  { name: "func.func", summary: "Function definition", traits: [], regions: 1 },
  { name: "func.return", summary: "Function return", traits: ["terminator"] },

  // tf
  { name: "tf.Const", summary: "Constant tensor", traits: ["pure"] },
  { name: "tf.AddV2", summary: "Elementwise add", traits: ["pure"] },
  { name: "tf.Mul", summary: "Elementwise multiply", traits: ["pure"] },
  { name: "tf.Identity", summary: "Forward input", traits: ["pure"] },
  { name: "tf.Shape", summary: "Runtime shape of a tensor", traits: ["pure"] },
  {
    name: "tf.ReadVariableOp",
    summary: "Current value of a resource variable",
    traits: [],
  },
  {
    name: "tf.VariableShape",
    summary: "Shape of the value a resource variable holds",
    traits: [],
  },
  {
    name: "tf.AssignVariableOp",
    summary: "Store a value into a resource variable",
    traits: ["resource_write"],
  },
  {
    name: "tf.AssignAddVariableOp",
    summary: "Add a value to a resource variable",
    traits: ["resource_write"],
  },
  {
    name: "tf.AssignSubVariableOp",
    summary: "Subtract a value from a resource variable",
    traits: ["resource_write"],
  },

  // tf_device
  {
    name: "tf_device.replicate",
    summary: "Run the body once per replica",
    traits: [],
    regions: 1,
  },
  { name: "tf_device.return", summary: "Replicate body terminator", traits: ["terminator"] },

  // tf_executor
  { name: "tf_executor.graph", summary: "Executor graph", traits: [], regions: 1 },
  { name: "tf_executor.island", summary: "Executor island", traits: [], regions: 1 },
  { name: "tf_executor.fetch", summary: "Graph terminator", traits: ["terminator"] },
  { name: "tf_executor.yield", summary: "Island terminator", traits: ["terminator"] },
] as const satisfies readonly OpDef[];

export type KnownOpName = (typeof OP_DEFS)[number]["name"];

export const MODULE_OP = "builtin.module" satisfies KnownOpName;
export const FUNC_OP = "func.func" satisfies KnownOpName;
export const RETURN_OP = "func.return" satisfies KnownOpName;
export const SHAPE_OP = "tf.Shape" satisfies KnownOpName;
export const READ_VARIABLE_OP = "tf.ReadVariableOp" satisfies KnownOpName;
export const VARIABLE_SHAPE_OP = "tf.VariableShape" satisfies KnownOpName;
export const REPLICATE_OP = "tf_device.replicate" satisfies KnownOpName;
export const DEVICE_RETURN_OP = "tf_device.return" satisfies KnownOpName;
export const GRAPH_OP = "tf_executor.graph" satisfies KnownOpName;
export const ISLAND_OP = "tf_executor.island" satisfies KnownOpName;
export const FETCH_OP = "tf_executor.fetch" satisfies KnownOpName;
export const YIELD_OP = "tf_executor.yield" satisfies KnownOpName;

const OP_DEF_BY_NAME = new Map<string, OpDef>(OP_DEFS.map((def) => [def.name, def]));

export function getOpDef(name: string): OpDef | undefined {
  return OP_DEF_BY_NAME.get(name);
}

export function isRegisteredOp(name: string): boolean {
  return OP_DEF_BY_NAME.has(name);
}

export function hasTrait(op: Operation, trait: OpTrait): boolean {
  return getOpDef(op.name)?.traits.includes(trait) ?? false;
}

export function isTerminator(op: Operation): boolean {
  return hasTrait(op, "terminator");
}

/** An operation known to be of kind `N`. */
export type OpOf<N extends KnownOpName> = Operation & { name: N };

export function isOp<N extends KnownOpName>(op: Operation, name: N): op is OpOf<N> {
  return op.name === name;
}

/** The block's last op, if it is a terminator. */
export function getTerminator(ir: IRContext, blockId: BlockId): Operation | undefined {
  const ops = ir.getBlock(blockId).ops;
  if (ops.length === 0) return undefined;
  const last = ir.getOp(ops[ops.length - 1]);
  return isTerminator(last) ? last : undefined;
}

/** The block's ops, minus a trailing terminator. */
export function withoutTerminator(ir: IRContext, blockId: BlockId): Operation[] {
  const ops = ir.getBlock(blockId).ops.map((id) => ir.getOp(id));
  const last = ops[ops.length - 1];
  if (last && isTerminator(last)) ops.pop();
  return ops;
}
