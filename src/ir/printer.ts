/**
 * Textual IR dump in MLIR's generic form. Values are numbered sequentially
 * per function (`%0`, `%1`, ...), multi-result ops print as `%3:2` and are
 * referenced as `%3#0`, `%3#1`; function arguments print as `%argN`.
 */

import { getFunctionName, getFunctionType } from "../dialect/func";
import { FUNC_OP, isOp, MODULE_OP } from "../dialect/ops";
import type { Attribute, BlockId, IRContext, OpId, Operation, ValueId } from "./ir";
import { formatResultTypes, formatType } from "./types";

const INDENT = "  ";

export function formatAttribute(attr: Attribute): string {
  switch (attr.kind) {
    case "int":
      return `${attr.value} : i${attr.width}`;
    case "string":
      return JSON.stringify(attr.value);
    case "bool":
      return String(attr.value);
    case "type":
      return formatType(attr.value);
    case "array":
      return `[${attr.value.map(formatAttribute).join(", ")}]`;
  }
}

class Printer {
  private readonly names = new Map<ValueId, string>();
  private nextValue = 0;
  readonly lines: string[] = [];

  constructor(private readonly ir: IRContext) {}

  print(op: Operation, indent: string): void {
    if (isOp(op, MODULE_OP)) {
      this.printModule(op, indent);
    } else if (isOp(op, FUNC_OP)) {
      this.printFunction(op, indent);
    } else {
      this.printGeneric(op, indent);
    }
  }

  private valueName(id: ValueId): string {
    return this.names.get(id) ?? "<<UNKNOWN SSA VALUE>>";
  }

  private printModule(op: Operation, indent: string): void {
    this.lines.push(`${indent}module {`);
    for (const blockId of this.ir.getRegion(op.regions[0]).blocks) {
      for (const opId of this.ir.getBlock(blockId).ops) {
        this.print(this.ir.getOp(opId), indent + INDENT);
      }
    }
    this.lines.push(`${indent}}`);
  }

  private printFunction(op: Operation, indent: string): void {
    this.nextValue = 0;
    const type = getFunctionType(op);
    const blocks = this.ir.getRegion(op.regions[0]).blocks;
    const entry = blocks[0];
    const args =
      entry === undefined
        ? []
        : this.ir.getBlock(entry).args.map((arg, i) => {
            this.names.set(arg, `%arg${i}`);
            return `%arg${i}: ${formatType(this.ir.getValue(arg).type)}`;
          });
    const results =
      type.results.length > 0 ? ` -> ${formatResultTypes(type.results)}` : "";

    this.lines.push(`${indent}func @${getFunctionName(op)}(${args.join(", ")})${results} {`);
    blocks.forEach((blockId, i) => {
      if (i > 0) this.printBlockHeader(blockId, i, indent);
      this.printBlockOps(blockId, indent + INDENT);
    });
    this.lines.push(`${indent}}`);
  }

  private printGeneric(op: Operation, indent: string): void {
    const head = `${indent}${this.nameResults(op)}"${op.name}"(${op.operands
      .map((v) => this.valueName(v))
      .join(", ")})`;
    if (op.regions.length === 0) {
      this.lines.push(`${head}${this.trailer(op)}`);
      return;
    }
    this.lines.push(`${head} ({`);
    op.regions.forEach((regionId, i) => {
      if (i > 0) this.lines.push(`${indent}}, {`);
      this.ir.getRegion(regionId).blocks.forEach((blockId, b) => {
        const block = this.ir.getBlock(blockId);
        if (b > 0 || block.args.length > 0) {
          this.printBlockHeader(blockId, b, indent);
        }
        this.printBlockOps(blockId, indent + INDENT);
      });
    });
    this.lines.push(`${indent}})${this.trailer(op)}`);
  }

  private printBlockHeader(blockId: BlockId, index: number, indent: string): void {
    const args = this.ir.getBlock(blockId).args.map((arg) => {
      const name = `%${this.nextValue++}`;
      this.names.set(arg, name);
      return `${name}: ${formatType(this.ir.getValue(arg).type)}`;
    });
    this.lines.push(
      args.length > 0 ? `${indent}^bb${index}(${args.join(", ")}):` : `${indent}^bb${index}:`,
    );
  }

  private printBlockOps(blockId: BlockId, indent: string): void {
    for (const opId of this.ir.getBlock(blockId).ops) {
      this.print(this.ir.getOp(opId), indent);
    }
  }

  private nameResults(op: Operation): string {
    if (op.results.length === 0) return "";
    const base = `%${this.nextValue++}`;
    if (op.results.length === 1) {
      this.names.set(op.results[0], base);
      return `${base} = `;
    }
    op.results.forEach((result, i) => this.names.set(result, `${base}#${i}`));
    return `${base}:${op.results.length} = `;
  }

  private trailer(op: Operation): string {
    const keys = Object.keys(op.attributes).sort();
    const attrs =
      keys.length > 0
        ? ` {${keys.map((k) => `${k} = ${formatAttribute(op.attributes[k])}`).join(", ")}}`
        : "";
    const operandTypes = op.operands.map((v) =>
      this.ir.hasValue(v) ? formatType(this.ir.getValue(v).type) : "<<ERASED>>",
    );
    const resultTypes = op.results.map((v) => this.ir.getValue(v).type);
    return `${attrs} : (${operandTypes.join(", ")}) -> ${formatResultTypes(resultTypes)}`;
  }
}

export function printOp(ir: IRContext, opId: OpId): string {
  const printer = new Printer(ir);
  printer.print(ir.getOp(opId), "");
  return printer.lines.join("\n");
}
