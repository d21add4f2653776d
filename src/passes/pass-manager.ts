import { getFunctionName, getFunctions } from "../dialect/func";
import { FUNC_OP, isOp } from "../dialect/ops";
import type { IRContext, OpId } from "../ir/ir";
import { verifyOrThrow } from "../ir/verifier";
import { type Config, getConfig } from "../support/config";
import { vlog } from "../support/logging";
import type { FunctionPass, PassStatistics } from "./pass";
import { createPass, parsePipeline } from "./registry";

export type PassManagerOptions = {
  config?: Partial<Config>;
};

export type PassRunResult = {
  /** Statistics per pass name, summed over all functions */
  stats: Map<string, PassStatistics>;
};

/**
 * Runs function passes in order over every `func.func` of a module (or over
 * a single function).
 */
export class PassManager {
  private readonly passes: FunctionPass[] = [];
  private readonly config: Config;

  constructor(options: PassManagerOptions = {}) {
    this.config = { ...getConfig(), ...options.config };
  }

  static fromPipeline(pipeline: string, options: PassManagerOptions = {}): PassManager {
    const pm = new PassManager(options);
    for (const name of parsePipeline(pipeline)) {
      pm.addPass(createPass(name));
    }
    return pm;
  }

  addPass(pass: FunctionPass): this {
    this.passes.push(pass);
    return this;
  }

  get passNames(): string[] {
    return this.passes.map((p) => p.name);
  }

  run(ir: IRContext, rootId: OpId): PassRunResult {
    const root = ir.getOp(rootId);
    const funcs = isOp(root, FUNC_OP) ? [root] : getFunctions(ir, root);
    const stats = new Map<string, PassStatistics>();

    for (const pass of this.passes) {
      const passStats: PassStatistics = stats.get(pass.name) ?? {};
      stats.set(pass.name, passStats);
      for (const func of funcs) {
        vlog(1, "pass-manager", `running ${pass.name} on @${getFunctionName(func)}`, this.config);
        pass.runOnFunction({ ir, func, config: this.config, stats: passStats });
        if (this.config.verifyEach) {
          verifyOrThrow(ir, func.id, pass.name);
        }
      }
    }
    return { stats };
  }
}
