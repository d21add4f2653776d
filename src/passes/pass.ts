import type { IRContext, Operation } from "../ir/ir";
import type { Config } from "../support/config";

/** Named counters a pass reports, e.g. `{ hoisted: 3 }`. */
export type PassStatistics = Record<string, number>;

export type PassContext = {
  ir: IRContext;
  /** The `func.func` being transformed */
  func: Operation;
  config: Config;
  stats: PassStatistics;
};

export interface FunctionPass {
  readonly name: string;
  readonly description: string;
  runOnFunction(ctx: PassContext): void;
}

export function bumpStat(stats: PassStatistics, key: string, by = 1): void {
  stats[key] = (stats[key] ?? 0) + by;
}

export function mergeStats(into: PassStatistics, from: PassStatistics): void {
  for (const [key, value] of Object.entries(from)) {
    bumpStat(into, key, value);
  }
}
