import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { createDeviceReturn, createReplicate } from "../src/dialect/replicate";
import { OpBuilder } from "../src/ir/builder";
import type { BlockId, IRContext, OpId, Operation, ValueId } from "../src/ir/ir";
import { printOp } from "../src/ir/printer";
import { verify } from "../src/ir/verifier";
import {
  hoistReplicateInvariantOpsInFunction,
  isOpReplicateInvariant,
} from "../src/passes/replicate-invariant-op-hoisting";
import { I32, makeFunction, RESOURCE, SHAPE } from "./helpers/ir";

type BodyOp =
  | { kind: "const" }
  | { kind: "add"; lhs: number; rhs: number }
  | { kind: "shape"; input: number }
  | { kind: "read" }
  | { kind: "read_shape" }
  | { kind: "wrapper"; input: number };

const pickArb = fc.nat({ max: 64 });

const bodyArb = fc.array(
  fc.oneof(
    fc.constant<BodyOp>({ kind: "const" }),
    fc.tuple(pickArb, pickArb).map(([lhs, rhs]): BodyOp => ({ kind: "add", lhs, rhs })),
    pickArb.map((input): BodyOp => ({ kind: "shape", input })),
    fc.constant<BodyOp>({ kind: "read" }),
    fc.constant<BodyOp>({ kind: "read_shape" }),
    pickArb.map((input): BodyOp => ({ kind: "wrapper", input })),
  ),
  { minLength: 1, maxLength: 16 },
);

/** A hoisted op that the pass creates itself, in place of a shape of a resource read. */
const VARIABLE_SHAPE = "variable_shape";

type Built = {
  ir: IRContext;
  funcId: OpId;
  replicateId: OpId;
  bodyId: BlockId;
  /** First-replica operand of the replicated resource */
  resource: ValueId;
  /** Body ops in creation order, with the shape ops the pass replaces marked */
  bodyOps: (OpId | typeof VARIABLE_SHAPE)[];
  /** Per body op, whether it should end up outside the replicate */
  expectedInvariant: boolean[];
};

/**
 * Replicate (n = 2) over two tensor arguments and one resource argument,
 * plus one free function argument. Operands are picked from the free
 * argument, the body arguments and every earlier body result. With `nested`,
 * that replicate sits inside an outer replicate that feeds it.
 */
function build(spec: BodyOp[], nested = false): Built {
  const { ir, func, args, builder } = makeFunction([I32, I32, I32, I32, I32, RESOURCE, RESOURCE]);
  let scope = builder;
  let inputs: ValueId[][] = [
    [args[0], args[1]],
    [args[2], args[3]],
    [args[5], args[6]],
  ];
  let outerBuilder: OpBuilder | undefined;
  if (nested) {
    const outer = createReplicate(builder, { replicatedInputs: inputs, n: 2 });
    outerBuilder = OpBuilder.atEnd(ir, outer.body.id);
    scope = outerBuilder;
    inputs = outer.body.args.map((arg) => [arg, arg]);
  }

  const rep = createReplicate(scope, { replicatedInputs: inputs, n: 2 });
  const inner = OpBuilder.atEnd(ir, rep.body.id);
  const [b0, b1, bResource] = rep.body.args;

  // value -> invariant once the pass has run
  const invariant = new Map<ValueId, boolean>([
    [args[4], true],
    [b0, false],
    [b1, false],
  ]);
  const resourceReads = new Set<ValueId>();
  const pool: ValueId[] = [args[4], b0, b1];
  const pick = (n: number): ValueId => pool[n % pool.length];
  const isInvariant = (v: ValueId): boolean => invariant.get(v) ?? false;
  const isBodyArg = (v: ValueId): boolean => rep.body.args.includes(v);

  const bodyOps: (OpId | typeof VARIABLE_SHAPE)[] = [];
  const expectedInvariant: boolean[] = [];
  const record = (op: Operation, inv: boolean, replaced = false): void => {
    for (const result of op.results) {
      invariant.set(result, inv);
      pool.push(result);
    }
    bodyOps.push(replaced ? VARIABLE_SHAPE : op.id);
    expectedInvariant.push(inv);
  };
  const createRead = (): Operation => {
    const read = inner.create("tf.ReadVariableOp", { operands: [bResource], resultTypes: [I32] });
    resourceReads.add(read.results[0]);
    record(read, false);
    return read;
  };
  const createShape = (input: ValueId): void => {
    const shape = inner.create("tf.Shape", { operands: [input], resultTypes: [SHAPE] });
    if (resourceReads.has(input)) {
      record(shape, true, true);
    } else {
      record(shape, isBodyArg(input) || isInvariant(input));
    }
  };

  for (const op of spec) {
    switch (op.kind) {
      case "const":
        record(inner.create("tf.Const", { resultTypes: [I32] }), true);
        break;
      case "add": {
        const lhs = pick(op.lhs);
        const rhs = pick(op.rhs);
        const add = inner.create("tf.AddV2", { operands: [lhs, rhs], resultTypes: [I32] });
        record(add, isInvariant(lhs) && isInvariant(rhs));
        break;
      }
      case "shape":
        createShape(pick(op.input));
        break;
      case "read":
        createRead();
        break;
      case "read_shape":
        createShape(createRead().results[0]);
        break;
      case "wrapper": {
        const input = pick(op.input);
        const wrapper = inner.create("test.wrapper", { regions: 1 });
        OpBuilder.atEnd(ir, ir.createBlock(wrapper.regions[0]).id).create("tf.Identity", {
          operands: [input],
          resultTypes: [I32],
        });
        record(wrapper, isInvariant(input));
        break;
      }
    }
  }
  createDeviceReturn(inner);
  if (outerBuilder) createDeviceReturn(outerBuilder);
  builder.create("func.return");

  return {
    ir,
    funcId: func.op.id,
    replicateId: rep.op.id,
    bodyId: rep.body.id,
    resource: inputs[2][0],
    bodyOps,
    expectedInvariant,
  };
}

describe("replicate invariant op hoisting properties", () => {
  it("hoists exactly the invariant ops, in their original order", () => {
    fc.assert(
      fc.property(bodyArb, (spec) => {
        const built = build(spec);
        const { ir, funcId, replicateId, bodyId, resource, bodyOps, expectedInvariant } = built;

        const stats = hoistReplicateInvariantOpsInFunction(ir, funcId);

        const hoisted = bodyOps.filter((_, i) => expectedInvariant[i]);
        const kept = bodyOps.filter((_, i) => !expectedInvariant[i]);
        const entry = ir.getBlock(ir.getRegion(ir.getOp(funcId).regions[0]).blocks[0]);

        expect(stats.hoisted).toBe(hoisted.length);
        expect(stats.variableShapesCreated).toBe(
          bodyOps.filter((op) => op === VARIABLE_SHAPE).length,
        );
        hoisted.forEach((expected, i) => {
          const actual = ir.getOp(entry.ops[i]);
          if (expected === VARIABLE_SHAPE) {
            expect(actual.name).toBe("tf.VariableShape");
            expect(actual.operands).toEqual([resource]);
          } else {
            expect(actual.id).toBe(expected);
          }
        });
        expect(entry.ops[hoisted.length]).toBe(replicateId);

        const body = ir.getBlock(bodyId);
        expect(body.ops.slice(0, -1)).toEqual(kept);
        expect(ir.getOp(body.ops[body.ops.length - 1]).name).toBe("tf_device.return");

        const region = ir.getOp(replicateId).regions[0];
        for (const opId of body.ops.slice(0, -1)) {
          expect(isOpReplicateInvariant(ir, region, opId)).toBe(false);
        }
        expect(verify(ir, funcId)).toEqual([]);
      }),
      { numRuns: 60 },
    );
  });

  it("is a no-op on its own output", () => {
    fc.assert(
      fc.property(bodyArb, fc.boolean(), (spec, nested) => {
        const { ir, funcId } = build(spec, nested);
        hoistReplicateInvariantOpsInFunction(ir, funcId);
        const once = printOp(ir, funcId);

        const again = hoistReplicateInvariantOpsInFunction(ir, funcId);

        expect(again.hoisted).toBe(0);
        expect(again.shapeOpsRetargeted).toBe(0);
        expect(again.variableShapesCreated).toBe(0);
        expect(printOp(ir, funcId)).toBe(once);
        expect(verify(ir, funcId)).toEqual([]);
      }),
      { numRuns: 60 },
    );
  });
});
