import fs from "node:fs";
import path from "node:path";

import type { IRContext, OpId } from "../ir/ir";
import { printOp } from "../ir/printer";
import { type Config, getConfig } from "./config";
import { vlog } from "./logging";

// dump directory -> name -> number of dumps written under that name
const usedNames = new Map<string, Map<string, number>>();

function uniqueFileName(dir: string, name: string): string {
  let names = usedNames.get(dir);
  if (!names) {
    names = new Map();
    usedNames.set(dir, names);
  }
  const count = names.get(name) ?? 0;
  names.set(name, count + 1);
  return count === 0 ? `${name}.mlir` : `${name}_${count}.mlir`;
}

/** Forget previously used dump names (numbering restarts at the bare name). */
export function resetDumpNames(): void {
  usedNames.clear();
}

/**
 * Dump the printed form of `opId`. Writes `<dumpDir>/<name>.mlir` when a dump
 * directory is configured (later dumps of the same name into the same
 * directory get `_1`, `_2`, ...)
 * and returns the path; otherwise logs the IR and returns null.
 */
export function dumpOpToFile(
  ir: IRContext,
  opId: OpId,
  name: string,
  config: Config = getConfig(),
): string | null {
  const text = printOp(ir, opId);
  if (!config.dumpDir) {
    console.log(`[dump] ${name}\n${text}`);
    return null;
  }
  fs.mkdirSync(config.dumpDir, { recursive: true });
  const filePath = path.join(config.dumpDir, uniqueFileName(path.resolve(config.dumpDir), name));
  fs.writeFileSync(filePath, `${text}\n`);
  vlog(1, "dump", `wrote ${filePath}`, config);
  return filePath;
}
