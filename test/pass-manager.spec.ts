import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createFunction, createModule } from "../src/dialect/func";
import { createDeviceReturn, createReplicate } from "../src/dialect/replicate";
import { OpBuilder } from "../src/ir/builder";
import { IRVerificationError, UnknownPassError } from "../src/ir/errors";
import { IRContext } from "../src/ir/ir";
import type { FunctionPass } from "../src/passes/pass";
import { PassManager } from "../src/passes/pass-manager";
import {
  createPass,
  getPassRegistration,
  listPasses,
  parsePipeline,
  registerPass,
} from "../src/passes/registry";
import { DEFAULT_CONFIG, resetConfig, setConfig } from "../src/support/config";
import { resetDumpNames } from "../src/support/dump";
import { I32, SHAPE } from "./helpers/ir";

/** A module with two functions, each holding one replicate whose body takes a shape of its argument. */
function buildModule() {
  const ir = new IRContext();
  const module = createModule(ir);
  for (const name of ["f", "g"]) {
    const func = createFunction(ir, module, name, [I32, I32]);
    const [a0, a1] = func.entry.args;
    const builder = OpBuilder.atEnd(ir, func.entry.id);
    const rep = createReplicate(builder, { replicatedInputs: [[a0, a1]], n: 2 });
    const inner = OpBuilder.atEnd(ir, rep.body.id);
    inner.create("tf.Shape", { operands: [rep.body.args[0]], resultTypes: [SHAPE] });
    createDeviceReturn(inner);
    builder.create("func.return");
  }
  return { ir, module };
}

describe("pass registry", () => {
  it("registers the built-in passes", () => {
    expect(listPasses().map((p) => p.name)).toEqual(
      expect.arrayContaining([
        "tf-functional-to-executor-conversion",
        "tf-replicate-invariant-op-hoisting",
      ]),
    );
    expect(getPassRegistration("tf-replicate-invariant-op-hoisting")?.description).toBe(
      "Hoists replicate invariant operations out of replicate",
    );
    expect(getPassRegistration("tf-functional-to-executor-conversion")?.description).toBe(
      "Transform from func op to TF executor dialect.",
    );
  });

  it("creates fresh pass instances by name", () => {
    const pass = createPass("tf-replicate-invariant-op-hoisting");
    expect(pass.name).toBe("tf-replicate-invariant-op-hoisting");
    expect(createPass("tf-replicate-invariant-op-hoisting")).not.toBe(pass);
  });

  it("rejects unknown pass names", () => {
    expect(() => createPass("no-such-pass")).toThrow(UnknownPassError);
    expect(() => createPass("no-such-pass")).toThrow("Unknown pass: no-such-pass");
  });

  it("accepts custom registrations", () => {
    registerPass("test-noop", "Does nothing", () => ({
      name: "test-noop",
      description: "Does nothing",
      runOnFunction() {},
    }));
    expect(createPass("test-noop").description).toBe("Does nothing");
  });

  it("parses pipelines", () => {
    expect(parsePipeline(" a, b ,,c ")).toEqual(["a", "b", "c"]);
    expect(parsePipeline("")).toEqual([]);
  });
});

describe("PassManager", () => {
  beforeEach(() => {
    setConfig({ ...DEFAULT_CONFIG });
    resetDumpNames();
  });

  afterEach(() => {
    resetConfig();
    vi.restoreAllMocks();
  });

  it("runs a pipeline over every function of a module", () => {
    const { ir, module } = buildModule();
    const pm = PassManager.fromPipeline("tf-replicate-invariant-op-hoisting");

    const { stats } = pm.run(ir, module.op.id);

    expect(pm.passNames).toEqual(["tf-replicate-invariant-op-hoisting"]);
    expect(stats.get("tf-replicate-invariant-op-hoisting")).toEqual({
      replicatesProcessed: 2,
      shapeOpsRetargeted: 2,
      variableShapesCreated: 0,
      hoisted: 2,
    });
  });

  it("chains passes in order", () => {
    const { ir, module } = buildModule();
    const pm = PassManager.fromPipeline(
      "tf-replicate-invariant-op-hoisting,tf-functional-to-executor-conversion",
      { config: { verifyEach: true } },
    );

    const { stats } = pm.run(ir, module.op.id);

    expect(stats.get("tf-functional-to-executor-conversion")).toEqual({ functionsConverted: 2 });
    const [f] = ir.getBlock(ir.getRegion(module.op.regions[0]).blocks[0]).ops;
    const fBody = ir.getBlock(ir.getRegion(ir.getOp(f).regions[0]).blocks[0]);
    expect(fBody.ops.map((id) => ir.getOp(id).name)).toEqual(["tf_executor.graph", "func.return"]);
  });

  it("runs on a single function", () => {
    const { ir, module } = buildModule();
    const [f] = ir.getBlock(ir.getRegion(module.op.regions[0]).blocks[0]).ops;

    const { stats } = new PassManager()
      .addPass(createPass("tf-replicate-invariant-op-hoisting"))
      .run(ir, f);

    expect(stats.get("tf-replicate-invariant-op-hoisting")?.replicatesProcessed).toBe(1);
  });

  it("verifies after each pass when asked", () => {
    const { ir, module } = buildModule();
    const breaker: FunctionPass = {
      name: "test-breaker",
      description: "Appends an op after the terminator",
      runOnFunction({ ir: ctxIr, func }) {
        const entry = ctxIr.getRegion(func.regions[0]).blocks[0];
        OpBuilder.atEnd(ctxIr, entry).create("tf.Const", { resultTypes: [I32] });
      },
    };

    const lenient = new PassManager().addPass(breaker);
    expect(() => lenient.run(ir, module.op.id)).not.toThrow();

    const strict = new PassManager({ config: { verifyEach: true } }).addPass(breaker);
    expect(() => strict.run(ir, module.op.id)).toThrow(IRVerificationError);
    expect(() => strict.run(ir, module.op.id)).toThrow(/after test-breaker/);
  });

  it("logs pass execution at verbosity 1", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { ir, module } = buildModule();

    new PassManager({ config: { vlogLevel: 1 } })
      .addPass(createPass("tf-replicate-invariant-op-hoisting"))
      .run(ir, module.op.id);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("[pass-manager] running tf-replicate-invariant-op-hoisting on @f");
    expect(lines).toContain("[pass-manager] running tf-replicate-invariant-op-hoisting on @g");
    expect(lines.filter((l) => l.startsWith("[dump] replicate_invariant_op_hoisting_before\n"))).toHaveLength(2);
    expect(lines.filter((l) => l.startsWith("[replicate-invariant-op-hoisting]"))).toEqual([]);
  });

  it("adds per-op tracing at verbosity 2", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { ir, module } = buildModule();

    new PassManager({ config: { vlogLevel: 2 } })
      .addPass(createPass("tf-replicate-invariant-op-hoisting"))
      .run(ir, module.op.id);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain(
      "[replicate-invariant-op-hoisting] retargeted tf.Shape to replicated argument 0",
    );
    expect(lines).toContain("[replicate-invariant-op-hoisting] hoisted 'tf.Shape'");
  });
});
