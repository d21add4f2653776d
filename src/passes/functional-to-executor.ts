/**
 * Converts a single-block function into the executor dialect as one island:
 *
 *   func @my_fn(%argi...) -> (result_t) {
 *     %results:[[n_args]] = tf_executor.graph {
 *       %island_results:[[nargs + 1]] = tf_executor.island {
 *         ... original ops ...
 *         tf_executor.yield %results...
 *       }
 *       tf_executor.fetch %island_results#...
 *     }
 *     return %graph_results#...
 *   }
 */

import { getFunctionType } from "../dialect/func";
import {
  FETCH_OP,
  GRAPH_OP,
  ISLAND_OP,
  isOp,
  RETURN_OP,
  withoutTerminator,
  YIELD_OP,
} from "../dialect/ops";
import { OpBuilder } from "../ir/builder";
import type { IRContext, OpId } from "../ir/ir";
import { controlType } from "../ir/types";
import { withConfig } from "../support/config";
import { dumpOpToFile } from "../support/dump";
import { debugLog, vlogIsOn } from "../support/logging";
import { bumpStat, type FunctionPass } from "./pass";

export const FUNCTIONAL_TO_EXECUTOR_CONVERSION = {
  name: "tf-functional-to-executor-conversion",
  description: "Transform from func op to TF executor dialect.",
} as const;

const TAG = "functional-to-executor";

/** Returns true if the function was rewritten. */
export function convertFunctionalToExecutor(ir: IRContext, funcId: OpId): boolean {
  const func = ir.getOp(funcId);
  const blocks = ir.getRegion(func.regions[0]).blocks;
  if (blocks.length !== 1) {
    debugLog(TAG, "Expect single block function, skip conversion to tf_executor dialect");
    return false;
  }
  const bodyId = blocks[0];
  const body = ir.getBlock(bodyId);

  const copyRange = withoutTerminator(ir, bodyId);
  if (copyRange.length === 1 && isOp(copyRange[0], GRAPH_OP)) {
    // Already a graph.
    return false;
  }

  const lastId = body.ops[body.ops.length - 1];
  const returnOp = lastId === undefined ? undefined : ir.getOp(lastId);
  if (!returnOp || !isOp(returnOp, RETURN_OP)) {
    debugLog(TAG, "Expect function to end with return");
    return false;
  }
  const returned = returnOp.operands.slice();
  const resultTypes = getFunctionType(func).results;

  const builder = new OpBuilder(ir);
  builder.setInsertionPointToStart(bodyId);
  const graph = builder.create(GRAPH_OP, {
    resultTypes,
    regions: 1,
    loc: func.loc,
  });
  builder.createBlock(graph.regions[0]);
  const island = builder.create(ISLAND_OP, {
    resultTypes: [...resultTypes, controlType()],
    regions: 1,
    loc: func.loc,
  });

  const toFetch = island.results.slice();
  if (toFetch.length !== 1) {
    // Drop control result for fetch.
    toFetch.pop();
  }
  builder.create(FETCH_OP, { operands: toFetch, loc: func.loc });

  const islandBody = builder.createBlock(island.regions[0]);
  for (const op of copyRange) {
    ir.moveToEnd(op.id, islandBody.id);
  }
  builder.setInsertionPointToEnd(islandBody.id);
  builder.create(YIELD_OP, { operands: returned, loc: func.loc });

  graph.results.forEach((result, i) => {
    ir.setOperand(returnOp.id, i, result);
  });
  return true;
}

export function createFunctionalToExecutorConversionPass(): FunctionPass {
  return {
    ...FUNCTIONAL_TO_EXECUTOR_CONVERSION,
    runOnFunction(ctx) {
      if (vlogIsOn(1, ctx.config)) {
        dumpOpToFile(ctx.ir, ctx.func.id, "functional_to_executor_before", ctx.config);
      }

      const converted = withConfig(ctx.config, () =>
        convertFunctionalToExecutor(ctx.ir, ctx.func.id),
      );
      if (converted) bumpStat(ctx.stats, "functionsConverted");

      if (vlogIsOn(1, ctx.config)) {
        dumpOpToFile(ctx.ir, ctx.func.id, "functional_to_executor_after", ctx.config);
      }
    },
  };
}
