import { OpBuilder, stringAttr, typeAttr } from "../ir/builder";
import type { Block, IRContext, Location, OpId, Operation } from "../ir/ir";
import { type FunctionType, functionType, type Type } from "../ir/types";
import { FUNC_OP, isOp, MODULE_OP } from "./ops";

export type ModuleHandle = {
  op: Operation;
  body: Block;
};

export type FunctionHandle = {
  op: Operation;
  entry: Block;
};

export function createModule(ir: IRContext): ModuleHandle {
  const op = ir.createOp({ name: MODULE_OP, regions: 1 });
  const body = ir.createBlock(op.regions[0]);
  return { op, body };
}

/** Append a `func.func` named `name` to the module body. */
export function createFunction(
  ir: IRContext,
  module: ModuleHandle,
  name: string,
  inputs: Type[],
  results: Type[] = [],
  loc?: Location,
): FunctionHandle {
  const builder = OpBuilder.atEnd(ir, module.body.id);
  const op = builder.create(FUNC_OP, {
    attributes: {
      sym_name: stringAttr(name),
      function_type: typeAttr(functionType(inputs, results)),
    },
    regions: 1,
    loc,
  });
  const entry = ir.createBlock(op.regions[0], inputs);
  return { op, entry };
}

export function getFunctions(ir: IRContext, moduleOp: Operation): Operation[] {
  const body = ir.getRegion(moduleOp.regions[0]).blocks[0];
  if (body === undefined) return [];
  return ir
    .getBlock(body)
    .ops.map((id) => ir.getOp(id))
    .filter((op) => isOp(op, FUNC_OP));
}

export function getFunctionName(func: Operation): string {
  const attr = func.attributes.sym_name;
  return attr?.kind === "string" ? attr.value : "";
}

export function getFunctionType(func: Operation): FunctionType {
  const attr = func.attributes.function_type;
  if (attr?.kind === "type" && attr.value.kind === "function") {
    return attr.value;
  }
  return functionType([], []);
}

export function lookupFunction(
  ir: IRContext,
  moduleOp: Operation,
  name: string,
): Operation | undefined {
  return getFunctions(ir, moduleOp).find((f) => getFunctionName(f) === name);
}

export function getFunctionBody(ir: IRContext, funcId: OpId): Block {
  const func = ir.getOp(funcId);
  const entry = ir.getRegion(func.regions[0]).blocks[0];
  if (entry === undefined) {
    throw new Error(`Function '${getFunctionName(func)}' has no body`);
  }
  return ir.getBlock(entry);
}
